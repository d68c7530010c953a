/**
 * Arena Handles
 *
 * A handle is the position of an object inside the collection instance that
 * issued it. Handles carry that collection's scope so that a handle can never
 * be silently resolved against another collection.
 */

let nextScopeSerial = 0

/**
 * Identity of one collection instance.
 * Two collections built from identical data still get distinct scopes.
 */
export class CollectionScope {
  readonly serial: number

  constructor(readonly name: string) {
    this.serial = nextScopeSerial++
  }

  toString(): string {
    return `${this.name}#${this.serial}`
  }
}

/**
 * Opaque, totally ordered reference to an object of type `T`.
 *
 * Only collections create handles. Ordering is the insertion position, which
 * is only meaningful between handles sharing the same scope.
 */
export class Idx<T> {
  // Ties the handle to its object type without storing anything.
  private declare readonly phantom: T

  constructor(
    readonly scope: CollectionScope,
    readonly index: number,
  ) {}

  sameScope(other: Idx<T>): boolean {
    return this.scope === other.scope
  }

  compare(other: Idx<T>): number {
    return this.index - other.index
  }

  toString(): string {
    return `${this.scope.name}[${this.index}]`
  }
}
