/**
 * agency.txt → networks and companies
 */

import { z } from "zod"
import { CollectionWithId } from "@transit-model/relations"
import type { Company, Network } from "../objects"
import { resolveOptions, type ReaderOptionsInput } from "../options"
import { optionalText, parseRows, requiredText, type Row } from "./rows"

export const agencyRowSchema = z.object({
  agency_id: optionalText,
  agency_name: requiredText,
  agency_url: requiredText,
  agency_timezone: optionalText,
  agency_lang: optionalText,
  agency_phone: optionalText,
  agency_email: optionalText,
})

export type AgencyRow = z.output<typeof agencyRowSchema>

/**
 * Every agency is both a network and a company with the same id.
 * Agencies without `agency_id` share the default id, so a second one is a
 * duplicate identifier.
 */
export function readAgencies(
  rows: Iterable<Row>,
  options?: ReaderOptionsInput,
): { networks: CollectionWithId<Network>; companies: CollectionWithId<Company> } {
  const { defaultAgencyId } = resolveOptions(options)
  const agencies = parseRows("agency.txt", agencyRowSchema, rows)

  const networks = agencies.map(
    (agency): Network => ({
      id: agency.agency_id ?? defaultAgencyId,
      name: agency.agency_name,
      url: agency.agency_url,
      timezone: agency.agency_timezone,
      lang: agency.agency_lang,
      phone: agency.agency_phone,
    }),
  )
  const companies = agencies.map(
    (agency): Company => ({
      id: agency.agency_id ?? defaultAgencyId,
      name: agency.agency_name,
      url: agency.agency_url,
      mail: agency.agency_email,
      phone: agency.agency_phone,
    }),
  )

  return {
    networks: new CollectionWithId(networks, "networks"),
    companies: new CollectionWithId(companies, "companies"),
  }
}
