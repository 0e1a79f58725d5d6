/**
 * @since 1.0.0
 */
import * as internal from "cache-statistics/internal/statisticsMutator"
import type * as Statistics from "cache-statistics/Statistics"
import type * as Effect from "effect/Effect"

/**
 * @since 1.0.0
 * @category symbols
 */
export const StatisticsMutatorTypeId: unique symbol = internal.StatisticsMutatorTypeId

/**
 * @since 1.0.0
 * @category symbols
 */
export type StatisticsMutatorTypeId = typeof StatisticsMutatorTypeId

/**
 * A `StatisticsMutator` is the capability to record accesses into a
 * `Statistics`. It is handed out once, by the constructors in `Statistics`,
 * to whoever creates the tracker (normally the owning cache). Code that only
 * holds the `Statistics` handle can read the counters but cannot advance
 * them.
 *
 * @since 1.0.0
 * @category models
 */
export interface StatisticsMutator<Key> extends StatisticsMutator.Variance<Key> {
  /**
   * The statistics this mutator records into.
   */
  readonly statistics: Statistics.Statistics<Key>

  /**
   * Records an access to the specified key. The totals are always updated,
   * the counters of the key only when it is monitored. Recording never
   * starts monitoring a key.
   */
  recordAccess(key: Key, isHit: boolean): Effect.Effect<void>

  /**
   * Records a hit for the specified key.
   */
  recordHit(key: Key): Effect.Effect<void>

  /**
   * Records a miss for the specified key.
   */
  recordMiss(key: Key): Effect.Effect<void>
}

/**
 * @since 1.0.0
 */
export declare namespace StatisticsMutator {
  /**
   * @since 1.0.0
   * @category models
   */
  export interface Variance<Key> {
    readonly [StatisticsMutatorTypeId]: {
      readonly _Key: (_: Key) => void
    }
  }
}

/**
 * Returns the statistics the mutator records into.
 *
 * @since 1.0.0
 * @category getters
 */
export const statistics: <Key>(self: StatisticsMutator<Key>) => Statistics.Statistics<Key> = internal.statistics

/**
 * Records an access to the specified key, as a hit when `isHit` is `true` and
 * as a miss otherwise.
 *
 * @since 1.0.0
 * @category mutations
 */
export const recordAccess: {
  <Key>(key: Key, isHit: boolean): (self: StatisticsMutator<Key>) => Effect.Effect<void>
  <Key>(self: StatisticsMutator<Key>, key: Key, isHit: boolean): Effect.Effect<void>
} = internal.recordAccess

/**
 * Records a hit for the specified key.
 *
 * @since 1.0.0
 * @category mutations
 */
export const recordHit: {
  <Key>(key: Key): (self: StatisticsMutator<Key>) => Effect.Effect<void>
  <Key>(self: StatisticsMutator<Key>, key: Key): Effect.Effect<void>
} = internal.recordHit

/**
 * Records a miss for the specified key.
 *
 * @since 1.0.0
 * @category mutations
 */
export const recordMiss: {
  <Key>(key: Key): (self: StatisticsMutator<Key>) => Effect.Effect<void>
  <Key>(self: StatisticsMutator<Key>, key: Key): Effect.Effect<void>
} = internal.recordMiss
