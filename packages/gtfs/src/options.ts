/**
 * Reader Options
 */

import { z } from "zod"

export const readerOptionsSchema = z.object({
  /** Network/company id used for agencies and routes without agency_id */
  defaultAgencyId: z.string().min(1).default("default_agency_id"),
  /** Prefix of the stop areas generated for stop points without parent_station */
  stopAreaPrefix: z.string().default("Generated:"),
  /** Prepended to the id of every object except modes, e.g. "my_prefix:" */
  prefix: z.string().min(1).optional(),
  /** Day the dataset validity window is centred on; the current day when omitted */
  today: z.date().optional(),
})

export type ReaderOptions = z.output<typeof readerOptionsSchema>
export type ReaderOptionsInput = z.input<typeof readerOptionsSchema>

export function resolveOptions(input: ReaderOptionsInput = {}): ReaderOptions {
  return readerOptionsSchema.parse(input)
}
