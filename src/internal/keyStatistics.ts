import type * as KeyStatistics from "cache-statistics/KeyStatistics"

/** @internal */
const KeyStatisticsSymbolKey = "cache-statistics/KeyStatistics"

/** @internal */
export const KeyStatisticsTypeId: KeyStatistics.KeyStatisticsTypeId = Symbol.for(
  KeyStatisticsSymbolKey
) as KeyStatistics.KeyStatisticsTypeId

/**
 * The mutable counters behind a `KeyStatistics`. Only the tracker holds
 * references of this type, everyone else sees the read-only interface.
 *
 * @internal
 */
export class KeyStatisticsImpl implements KeyStatistics.KeyStatistics {
  readonly [KeyStatisticsTypeId]: KeyStatistics.KeyStatisticsTypeId = KeyStatisticsTypeId
  hits = 0
  misses = 0
  accesses(): number {
    return this.hits + this.misses
  }
}

/** @internal */
export const make = (): KeyStatisticsImpl => new KeyStatisticsImpl()

/** @internal */
export const trackHit = (self: KeyStatisticsImpl): void => {
  self.hits = self.hits + 1
}

/** @internal */
export const trackMiss = (self: KeyStatisticsImpl): void => {
  self.misses = self.misses + 1
}

/** @internal */
export const accesses = (self: KeyStatistics.KeyStatistics): number => self.accesses()

/** @internal */
export const isKeyStatistics = (u: unknown): u is KeyStatistics.KeyStatistics =>
  typeof u === "object" && u != null && KeyStatisticsTypeId in u
