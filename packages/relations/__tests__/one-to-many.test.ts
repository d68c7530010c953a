import { describe, it, expect, vi, afterEach } from "vitest"
import {
  CollectionWithId,
  HandleScopeError,
  IdxSet,
  OneToMany,
  ReferentialIntegrityError,
} from "../src"
import { stopArea, stopFixture, stopPoint, type StopArea, type StopPoint } from "./fixtures"

function stopAreasToStopPoints(
  stopAreas: CollectionWithId<StopArea>,
  stopPoints: CollectionWithId<StopPoint>,
) {
  return OneToMany.create(stopAreas, stopPoints, "stop_areas_to_stop_points", (sp) => sp.stopAreaId)
}

describe("OneToMany", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe("end-to-end scenario", () => {
    const { stopAreas, stopPoints } = stopFixture()
    const relation = stopAreasToStopPoints(stopAreas, stopPoints)

    it("should list every parent with children", () => {
      expect(stopAreas.idsOf(relation.getFrom())).toEqual(["SA1", "SA2"])
    })

    it("should project parents to their children", () => {
      const children = relation.getCorrespondingForward(stopAreas.idxSetOf(["SA1"]))

      expect(stopPoints.idsOf(children)).toEqual(["SP1", "SP2"])
    })

    it("should project children back to their parents", () => {
      const parents = relation.getCorrespondingBackward(stopPoints.idxSetOf(["SP3"]))

      expect(stopAreas.idsOf(parents)).toEqual(["SA2"])
    })

    it("should collapse parents shared by several children", () => {
      const parents = relation.getCorrespondingBackward(stopPoints.indexes())

      expect(stopAreas.idsOf(parents)).toEqual(["SA1", "SA2"])
      expect(stopAreas.idsOf(relation.getCorrespondingBackward(stopPoints.idxSetOf(["SP1", "SP2"])))).toEqual([
        "SA1",
      ])
    })

    it("should build identically twice from the same inputs", () => {
      const again = stopAreasToStopPoints(stopAreas, stopPoints)

      expect(again.getFrom().toArray()).toEqual(relation.getFrom().toArray())
      for (const idx of stopAreas.indexes()) {
        const single = IdxSet.of(idx)
        expect(again.getCorrespondingForward(single).toArray()).toEqual(
          relation.getCorrespondingForward(single).toArray(),
        )
      }
      expect(again.getCorrespondingBackward(stopPoints.indexes()).toArray()).toEqual(
        relation.getCorrespondingBackward(stopPoints.indexes()).toArray(),
      )
      expect(again.stats()).toEqual(relation.stats())
    })

    it("should report stats", () => {
      expect(relation.stats()).toEqual({ kind: "one-to-many", from: 2, associations: 3 })
      expect(relation.name).toBe("stop_areas_to_stop_points")
    })

    it("should return the parent of a single child", () => {
      const sp3 = stopPoints.getIdx("SP3")
      if (!sp3) throw new Error("missing SP3")

      expect(relation.getOne(sp3)).toBe(stopAreas.getIdx("SA2"))
    })
  })

  it("should exclude parents without children", () => {
    const stopAreas = new CollectionWithId([stopArea("A"), stopArea("B")], "stop_areas")
    const stopPoints = new CollectionWithId([stopPoint("P1", "A"), stopPoint("P2", "A")], "stop_points")

    const relation = stopAreasToStopPoints(stopAreas, stopPoints)

    expect(stopAreas.idsOf(relation.getFrom())).toEqual(["A"])
  })

  it("should build an empty relation from an empty many collection", () => {
    const stopAreas = new CollectionWithId([stopArea("A")], "stop_areas")
    const stopPoints = CollectionWithId.empty<StopPoint>("stop_points")

    const relation = stopAreasToStopPoints(stopAreas, stopPoints)

    expect(relation.getFrom().isEmpty()).toBe(true)
    expect(relation.getCorrespondingForward(stopAreas.indexes()).isEmpty()).toBe(true)
  })

  describe("referential integrity", () => {
    const stopAreas = new CollectionWithId([stopArea("SA1")], "stop_areas")
    const stopPoints = new CollectionWithId(
      [stopPoint("SP1", "SA1"), stopPoint("SP2", "SA9")],
      "stop_points",
    )

    it("should fail when a foreign key does not resolve", () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined)

      expect(() => stopAreasToStopPoints(stopAreas, stopPoints)).toThrow(ReferentialIntegrityError)
      expect(() => stopAreasToStopPoints(stopAreas, stopPoints)).toThrow(
        "Error indexing stop_areas_to_stop_points: id=SA9 not found",
      )
    })

    it("should carry the relation name and the unresolved id", () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined)

      let caught: unknown
      try {
        stopAreasToStopPoints(stopAreas, stopPoints)
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(ReferentialIntegrityError)
      if (caught instanceof ReferentialIntegrityError) {
        expect(caught.relationName).toBe("stop_areas_to_stop_points")
        expect(caught.id).toBe("SA9")
        expect(caught.code).toBe("E_REFERENTIAL_INTEGRITY")
      }
    })

    it("should log the failure", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)

      expect(() => stopAreasToStopPoints(stopAreas, stopPoints)).toThrow(ReferentialIntegrityError)

      expect(warn).toHaveBeenCalledWith(
        expect.stringContaining("[WARN] [relation.failed] stop_areas_to_stop_points id=SA9 not found"),
      )
    })
  })

  describe("lookup leniency", () => {
    it("should project a parent without children to the empty set", () => {
      const stopAreas = new CollectionWithId([stopArea("A"), stopArea("B")], "stop_areas")
      const stopPoints = new CollectionWithId([stopPoint("P1", "A")], "stop_points")
      const relation = stopAreasToStopPoints(stopAreas, stopPoints)

      const children = relation.getCorrespondingForward(stopAreas.idxSetOf(["B"]))

      expect(children.isEmpty()).toBe(true)
    })

    it("should project the empty set to the empty set in both directions", () => {
      const { stopAreas, stopPoints } = stopFixture()
      const relation = stopAreasToStopPoints(stopAreas, stopPoints)

      expect(relation.getCorrespondingForward(IdxSet.empty()).isEmpty()).toBe(true)
      expect(relation.getCorrespondingBackward(IdxSet.empty()).isEmpty()).toBe(true)
    })
  })

  describe("collection scoping", () => {
    const { stopAreas, stopPoints } = stopFixture()
    const relation = stopAreasToStopPoints(stopAreas, stopPoints)
    const other = stopFixture()

    it("should reject parents drawn from another collection instance", () => {
      expect(() => relation.getCorrespondingForward(other.stopAreas.indexes())).toThrow(HandleScopeError)
    })

    it("should reject children drawn from another collection instance", () => {
      expect(() => relation.getCorrespondingBackward(other.stopPoints.indexes())).toThrow(HandleScopeError)
    })

    it("should reject a single child handle from another collection instance", () => {
      const sp1 = other.stopPoints.getIdx("SP1")
      if (!sp1) throw new Error("missing SP1")

      expect(() => relation.getOne(sp1)).toThrow(HandleScopeError)
    })
  })
})
