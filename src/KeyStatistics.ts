/**
 * @since 1.0.0
 */
import * as internal from "cache-statistics/internal/keyStatistics"

/**
 * @since 1.0.0
 * @category symbols
 */
export const KeyStatisticsTypeId: unique symbol = internal.KeyStatisticsTypeId

/**
 * @since 1.0.0
 * @category symbols
 */
export type KeyStatisticsTypeId = typeof KeyStatisticsTypeId

/**
 * `KeyStatistics` represents the hit and miss counters recorded for a single
 * monitored key.
 *
 * The value handed out by `Statistics.statsFor` is live: it keeps advancing
 * while the key stays monitored and stops once the key is unmonitored.
 *
 * @since 1.0.0
 * @category models
 */
export interface KeyStatistics {
  readonly [KeyStatisticsTypeId]: KeyStatisticsTypeId
  readonly hits: number
  readonly misses: number
  /**
   * Returns the sum of hits and misses.
   */
  accesses(): number
}

/**
 * Returns the number of accesses, hits and misses together, recorded for
 * the key.
 *
 * @since 1.0.0
 * @category getters
 */
export const accesses: (self: KeyStatistics) => number = internal.accesses

/**
 * @since 1.0.0
 * @category refinements
 */
export const isKeyStatistics: (u: unknown) => u is KeyStatistics = internal.isKeyStatistics
