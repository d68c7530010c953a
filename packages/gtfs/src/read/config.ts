/**
 * Contributor and dataset configuration → contributors and datasets
 */

import { z } from "zod"
import { CollectionWithId } from "@transit-model/relations"
import { InvalidDatasetConfigError } from "../errors"
import type { Contributor, Dataset } from "../objects"
import { resolveOptions, type ReaderOptionsInput } from "../options"

export const datasetConfigSchema = z.object({
  contributor: z.object({
    contributor_id: z.string().min(1),
    contributor_name: z.string().min(1),
    contributor_license: z.string().optional(),
    contributor_website: z.string().optional(),
  }),
  dataset: z.object({
    dataset_id: z.string().min(1),
  }),
})

export type DatasetConfig = z.input<typeof datasetConfigSchema>

export const DEFAULT_CONTRIBUTOR: Readonly<Contributor> = Object.freeze({
  id: "default_contributor",
  name: "Default contributor",
  license: "Unknown license",
})

export const DEFAULT_DATASET_ID = "default_dataset"

/** Days of validity on each side of the reading day */
export const VALIDITY_MARGIN_DAYS = 15

/**
 * One contributor and the one dataset it publishes.
 *
 * The dataset is valid from 15 days before to 15 days after `options.today`
 * (UTC). Without a configuration the default contributor and dataset are used.
 *
 * @throws InvalidDatasetConfigError if `config` does not match {@link datasetConfigSchema}
 */
export function readConfig(
  config?: unknown,
  options?: ReaderOptionsInput,
): { contributors: CollectionWithId<Contributor>; datasets: CollectionWithId<Dataset> } {
  const today = resolveOptions(options).today ?? new Date()

  let contributor: Contributor = { ...DEFAULT_CONTRIBUTOR }
  let datasetId = DEFAULT_DATASET_ID
  if (config !== undefined) {
    const result = datasetConfigSchema.safeParse(config)
    if (!result.success) {
      const issue = result.error.errors[0]
      throw new InvalidDatasetConfigError(
        issue?.path.join(".") || undefined,
        issue?.message ?? "validation failed",
      )
    }
    const { contributor: c, dataset } = result.data
    contributor = {
      id: c.contributor_id,
      name: c.contributor_name,
      license: c.contributor_license,
      website: c.contributor_website,
    }
    datasetId = dataset.dataset_id
  }

  const dataset: Dataset = {
    id: datasetId,
    contributorId: contributor.id,
    startDate: isoDate(today, -VALIDITY_MARGIN_DAYS),
    endDate: isoDate(today, VALIDITY_MARGIN_DAYS),
  }

  return {
    contributors: new CollectionWithId([contributor], "contributors"),
    datasets: new CollectionWithId([dataset], "datasets"),
  }
}

function isoDate(day: Date, offsetDays: number): string {
  const shifted = new Date(Date.UTC(day.getUTCFullYear(), day.getUTCMonth(), day.getUTCDate() + offsetDays))
  return shifted.toISOString().slice(0, 10)
}
