/**
 * Row parsing shared by the table readers.
 *
 * Tables arrive as one record of raw strings per row, keyed by column name.
 * Empty cells are treated as absent values.
 */

import { z } from "zod"
import { InvalidRowError } from "../errors"

export type Row = Readonly<Record<string, string | undefined>>

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value

/** Optional text cell */
export const optionalText = z.preprocess(blankToUndefined, z.string().optional())

/** Required, non-empty text cell */
export const requiredText = z.preprocess(blankToUndefined, z.string())

/** Text cell defaulting to "" */
export const textOrEmpty = z.preprocess(blankToUndefined, z.string().default(""))

/** Decimal number cell, e.g. coordinates */
export const decimal = z.preprocess(
  blankToUndefined,
  z.string().regex(/^[+-]?(\d+\.?\d*|\.\d+)$/, "Expected a decimal number").transform(Number),
)

/** Non-negative integer cell, undefined when empty */
export const optionalInteger = z.preprocess(
  blankToUndefined,
  z.string().regex(/^\d+$/, "Expected an integer").transform(Number).optional(),
)

/** Six-digit hexadecimal color, e.g. 8F7A32 */
export const optionalColor = z.preprocess(
  blankToUndefined,
  z.string().regex(/^[0-9A-Fa-f]{6}$/, "Expected a RRGGBB color").optional(),
)

/**
 * Validate every row of a table against a schema.
 * @throws InvalidRowError for the first row that does not match
 */
export function parseRows<S extends z.ZodTypeAny>(
  table: string,
  schema: S,
  rows: Iterable<Row>,
): Array<z.output<S>> {
  const parsed: Array<z.output<S>> = []
  let line = 1
  for (const row of rows) {
    line++
    const result = schema.safeParse(row)
    if (!result.success) {
      const issue = result.error.errors[0]
      throw new InvalidRowError(
        table,
        line,
        issue?.path.join(".") || undefined,
        issue?.message ?? "validation failed",
      )
    }
    parsed.push(result.data)
  }
  return parsed
}
