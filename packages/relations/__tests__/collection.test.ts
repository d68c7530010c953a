import { describe, it, expect } from "vitest"
import {
  CollectionWithId,
  DuplicateIdentifierError,
  HandleRangeError,
  HandleScopeError,
  Idx,
  TransitModelError,
} from "../src"
import { stopArea, type StopArea } from "./fixtures"

describe("CollectionWithId", () => {
  it("should assign handles in insertion order", () => {
    const areas = new CollectionWithId([stopArea("SA2"), stopArea("SA1")], "stop_areas")

    expect(areas.getIdx("SA2")?.index).toBe(0)
    expect(areas.getIdx("SA1")?.index).toBe(1)
    expect(areas.size).toBe(2)
    expect(areas.name).toBe("stop_areas")
  })

  it("should dereference handles", () => {
    const areas = new CollectionWithId([stopArea("SA1")], "stop_areas")
    const idx = areas.getIdx("SA1")
    if (!idx) throw new Error("missing SA1")

    expect(areas.get(idx)).toEqual({ id: "SA1", name: "Area SA1" })
    expect(areas.getById("SA1")?.name).toBe("Area SA1")
  })

  it("should return undefined for unknown ids", () => {
    const areas = new CollectionWithId([stopArea("SA1")], "stop_areas")

    expect(areas.getIdx("nope")).toBeUndefined()
    expect(areas.getById("nope")).toBeUndefined()
  })

  it("should reject duplicate identifiers", () => {
    const build = () => new CollectionWithId([stopArea("SA1"), stopArea("SA1")], "stop_areas")

    expect(build).toThrow(DuplicateIdentifierError)
    expect(build).toThrow("Duplicate identifier in stop_areas: SA1")
  })

  it("should expose code and name on duplicate identifier errors", () => {
    try {
      new CollectionWithId([stopArea("X"), stopArea("X")], "stop_areas")
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(TransitModelError)
      expect(error).toBeInstanceOf(DuplicateIdentifierError)
      if (error instanceof DuplicateIdentifierError) {
        expect(error.code).toBe("E_DUPLICATE_ID")
        expect(error.name).toBe("DuplicateIdentifierError")
        expect(error.collectionName).toBe("stop_areas")
        expect(error.id).toBe("X")
      }
    }
  })

  it("should iterate entries in handle order", () => {
    const areas = new CollectionWithId([stopArea("B"), stopArea("A"), stopArea("C")], "stop_areas")

    const seen = [...areas].map(([idx, area]) => `${idx.index}:${area.id}`)

    expect(seen).toEqual(["0:B", "1:A", "2:C"])
    expect(areas.values().map((a) => a.id)).toEqual(["B", "A", "C"])
  })

  it("should build index sets from ids, skipping unknown ones", () => {
    const areas = new CollectionWithId([stopArea("A"), stopArea("B"), stopArea("C")], "stop_areas")

    const set = areas.idxSetOf(["C", "missing", "A"])

    expect(areas.idsOf(set)).toEqual(["A", "C"])
    expect(areas.idsOf(areas.indexes())).toEqual(["A", "B", "C"])
  })

  it("should support empty collections", () => {
    const empty = CollectionWithId.empty<{ id: string }>("nothing")

    expect(empty.isEmpty()).toBe(true)
    expect(empty.indexes().isEmpty()).toBe(true)
    expect([...empty]).toEqual([])
  })

  it("should refuse to dereference a handle issued by another collection", () => {
    const first = new CollectionWithId([stopArea("SA1")], "stop_areas")
    const second = new CollectionWithId([stopArea("SA1")], "stop_areas")
    const foreign = second.getIdx("SA1")
    if (!foreign) throw new Error("missing SA1")

    expect(() => first.get(foreign)).toThrow(HandleScopeError)
  })

  it("should report a handle past the last object as out of range", () => {
    const areas = new CollectionWithId([stopArea("SA1")], "stop_areas")
    const forged = new Idx<StopArea>(areas.scope, 99)

    try {
      areas.get(forged)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(HandleRangeError)
      expect(error).not.toBeInstanceOf(HandleScopeError)
      if (error instanceof HandleRangeError) {
        expect(error.code).toBe("E_HANDLE_RANGE")
        expect(error.index).toBe(99)
        expect(error.size).toBe(1)
        expect(error.message).toBe(`Handle out of range for ${areas.scope.toString()}: index 99, size 1`)
      }
    }
  })

  it("should give each instance its own scope", () => {
    const first = new CollectionWithId([stopArea("SA1")], "stop_areas")
    const second = new CollectionWithId([stopArea("SA1")], "stop_areas")

    const mine = first.getIdx("SA1")
    const theirs = second.getIdx("SA1")
    if (!mine || !theirs) throw new Error("missing SA1")

    expect(first.scope).not.toBe(second.scope)
    expect(mine.sameScope(theirs)).toBe(false)
    expect(mine.toString()).toBe("stop_areas[0]")
  })
})
