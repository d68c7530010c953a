/**
 * Id prefixing
 *
 * Namespaces every object of a dataset so that several datasets can be merged
 * without id collisions. References are rewritten along with the ids, so the
 * prefixed collections index exactly like the original ones.
 */

import { z } from "zod"
import { CollectionWithId, ConfigError, logger, type Identified } from "@transit-model/relations"
import type { Collections } from "./model"

export const prefixSchema = z.string().min(1, "Prefix must not be empty")

/**
 * Prepend `prefix` to the ids of every collection and to the ids they reference.
 *
 * Commercial and physical modes are shared reference data and keep their ids,
 * as does `Line.commercialModeId`.
 *
 * @throws ConfigError if the prefix is empty
 *
 * @example
 * ```typescript
 * const prefixed = addPrefix(readCollections(tables), "my_prefix:")
 * prefixed.stopPoints.getById("my_prefix:SP1")?.stopAreaId // "my_prefix:SA1"
 * ```
 */
export function addPrefix(collections: Collections, prefix: string): Collections {
  const result = prefixSchema.safeParse(prefix)
  if (!result.success) {
    throw new ConfigError(`Invalid prefix: ${result.error.errors[0]?.message ?? "validation failed"}`, "prefix")
  }
  const p = (id: string) => `${result.data}${id}`

  const prefixed: Collections = {
    networks: rebuild(collections.networks, (n) => ({ ...n, id: p(n.id) })),
    companies: rebuild(collections.companies, (c) => ({ ...c, id: p(c.id) })),
    stopAreas: rebuild(collections.stopAreas, (sa) => ({ ...sa, id: p(sa.id) })),
    stopPoints: rebuild(collections.stopPoints, (sp) => ({
      ...sp,
      id: p(sp.id),
      stopAreaId: p(sp.stopAreaId),
    })),
    commercialModes: collections.commercialModes,
    physicalModes: collections.physicalModes,
    lines: rebuild(collections.lines, (l) => ({ ...l, id: p(l.id), networkId: p(l.networkId) })),
    routes: rebuild(collections.routes, (r) => ({ ...r, id: p(r.id), lineId: p(r.lineId) })),
    contributors: rebuild(collections.contributors, (c) => ({ ...c, id: p(c.id) })),
    datasets: rebuild(collections.datasets, (d) => ({
      ...d,
      id: p(d.id),
      contributorId: p(d.contributorId),
    })),
  }
  logger.debug("prefix.applied", { subject: result.data })
  return prefixed
}

function rebuild<T extends Identified>(collection: CollectionWithId<T>, rewrite: (obj: T) => T): CollectionWithId<T> {
  return new CollectionWithId(collection.values().map(rewrite), collection.name)
}
