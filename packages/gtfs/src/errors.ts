/**
 * Ingestion Errors
 */

import { TransitModelError } from "@transit-model/relations"

/**
 * Thrown when a table row does not match its expected shape.
 * `line` counts the header as line 1.
 */
export class InvalidRowError extends TransitModelError {
  readonly code = "E_INVALID_ROW"

  constructor(
    public readonly table: string,
    public readonly line: number,
    public readonly field: string | undefined,
    reason: string,
  ) {
    super(`Invalid row in ${table} at line ${line}${field ? ` (${field})` : ""}: ${reason}`)
    this.name = "InvalidRowError"
  }
}

/**
 * Thrown when the contributor/dataset configuration does not match its shape.
 */
export class InvalidDatasetConfigError extends TransitModelError {
  readonly code = "E_INVALID_DATASET_CONFIG"

  constructor(
    public readonly field: string | undefined,
    reason: string,
  ) {
    super(`Invalid dataset configuration${field ? ` (${field})` : ""}: ${reason}`)
    this.name = "InvalidDatasetConfigError"
  }
}
