import type * as KeyStatistics from "cache-statistics/internal/keyStatistics"
import * as MutableHashMap from "effect/MutableHashMap"

/**
 * The `StatisticsState` represents the mutable state underlying a tracker.
 *
 * @internal
 */
export interface StatisticsState<Key> {
  map: MutableHashMap.MutableHashMap<Key, KeyStatistics.KeyStatisticsImpl>
  totalAccesses: number
  totalHits: number
}

/**
 * Constructs a new `StatisticsState` from the specified values.
 *
 * @internal
 */
export const make = <Key>(
  map: MutableHashMap.MutableHashMap<Key, KeyStatistics.KeyStatisticsImpl>,
  totalAccesses: number,
  totalHits: number
): StatisticsState<Key> => ({
  map,
  totalAccesses,
  totalHits
})

/**
 * Constructs an initial tracker state with nothing monitored.
 *
 * @internal
 */
export const initial = <Key>(): StatisticsState<Key> => make(MutableHashMap.empty(), 0, 0)
