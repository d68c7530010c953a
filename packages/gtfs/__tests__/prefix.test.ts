import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { ConfigError } from "@transit-model/relations"
import { Model, addPrefix, readCollections, type GtfsTables } from "../src"

const tables: GtfsTables = {
  agency: [{ agency_id: "A1", agency_name: "Metro Co", agency_url: "http://metro.example" }],
  stops: [
    { stop_id: "SA1", stop_name: "Central", stop_lat: "0.1", stop_lon: "1.2", location_type: "1" },
    { stop_id: "SP1", stop_name: "Central A", stop_lat: "0.1", stop_lon: "1.2", parent_station: "SA1" },
    { stop_id: "SP2", stop_name: "Harbour", stop_lat: "0.3", stop_lon: "1.4" },
  ],
  routes: [{ route_id: "R1", agency_id: "A1", route_short_name: "1", route_type: "3" }],
  trips: [{ trip_id: "T1", route_id: "R1", service_id: "S" }],
  config: {
    contributor: { contributor_id: "C1", contributor_name: "City transit" },
    dataset: { dataset_id: "D1" },
  },
}

describe("addPrefix", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined)
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  const original = readCollections(tables)
  const prefixed = addPrefix(original, "my_prefix:")

  it("should prefix the id of every object", () => {
    expect(prefixed.networks.values().map((n) => n.id)).toEqual(["my_prefix:A1"])
    expect(prefixed.companies.values().map((c) => c.id)).toEqual(["my_prefix:A1"])
    expect(prefixed.stopAreas.values().map((sa) => sa.id)).toEqual(["my_prefix:SA1", "my_prefix:Generated:SP2"])
    expect(prefixed.stopPoints.values().map((sp) => sp.id)).toEqual(["my_prefix:SP1", "my_prefix:SP2"])
    expect(prefixed.lines.values().map((l) => l.id)).toEqual(["my_prefix:R1"])
    expect(prefixed.routes.values().map((r) => r.id)).toEqual(["my_prefix:R1"])
    expect(prefixed.contributors.values().map((c) => c.id)).toEqual(["my_prefix:C1"])
    expect(prefixed.datasets.values().map((d) => d.id)).toEqual(["my_prefix:D1"])
  })

  it("should rewrite references along with the ids", () => {
    expect(prefixed.stopPoints.values().map((sp) => [sp.id, sp.stopAreaId])).toEqual([
      ["my_prefix:SP1", "my_prefix:SA1"],
      ["my_prefix:SP2", "my_prefix:Generated:SP2"],
    ])
    expect(prefixed.lines.getById("my_prefix:R1")?.networkId).toBe("my_prefix:A1")
    expect(prefixed.routes.getById("my_prefix:R1")?.lineId).toBe("my_prefix:R1")
    expect(prefixed.datasets.getById("my_prefix:D1")?.contributorId).toBe("my_prefix:C1")
  })

  it("should keep modes and the mode references of lines", () => {
    expect(prefixed.commercialModes).toBe(original.commercialModes)
    expect(prefixed.physicalModes).toBe(original.physicalModes)
    expect(prefixed.lines.getById("my_prefix:R1")?.commercialModeId).toBe(
      original.lines.getById("R1")?.commercialModeId,
    )
  })

  it("should leave the other fields and the original collections untouched", () => {
    expect(prefixed.stopAreas.getById("my_prefix:SA1")?.name).toBe("Central")
    expect(original.stopPoints.getById("SP1")?.stopAreaId).toBe("SA1")
  })

  it("should build a model from prefixed collections", () => {
    const model = Model.build(prefixed)

    expect(model.routesOfNetworks(["my_prefix:A1"])).toEqual(["my_prefix:R1"])
    expect(model.stopPointsOfStopAreas(["my_prefix:SA1"])).toEqual(["my_prefix:SP1"])
    expect(model.routesOfNetworks(["A1"])).toEqual([])
  })

  it("should apply the prefix option while reading", () => {
    const read = readCollections(tables, { prefix: "my_prefix:" })

    expect(read.stopPoints.values().map((sp) => sp.stopAreaId)).toEqual(["my_prefix:SA1", "my_prefix:Generated:SP2"])
    expect(read.datasets.values()[0]?.contributorId).toBe("my_prefix:C1")
  })

  it("should reject an empty prefix", () => {
    expect(() => addPrefix(original, "")).toThrow(ConfigError)
    expect(() => addPrefix(original, "")).toThrow("Invalid prefix: Prefix must not be empty")
  })
})
