/**
 * @since 1.0.0
 */
import * as internal from "cache-statistics/internal/statistics"
import type * as KeyStatistics from "cache-statistics/KeyStatistics"
import type * as StatisticsMutator from "cache-statistics/StatisticsMutator"
import type { UnmonitoredKeyError } from "cache-statistics/UnmonitoredKeyError"
import type * as Chunk from "effect/Chunk"
import type * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import type * as Effect from "effect/Effect"

/**
 * @since 1.0.0
 * @category symbols
 */
export const StatisticsTypeId: unique symbol = internal.StatisticsTypeId

/**
 * @since 1.0.0
 * @category symbols
 */
export type StatisticsTypeId = typeof StatisticsTypeId

/**
 * A `Statistics` tracks the accesses made to a cache. It keeps two
 * tracker-wide totals, the number of accesses and the number of hits, that
 * count every access the cache reports. In addition it keeps hit and miss
 * counters for each monitored key. Accesses to keys that are not monitored
 * only contribute to the totals.
 *
 * Keys are compared using `Equal` and `Hash`, so `Data` values can be used as
 * keys and are compared structurally.
 *
 * A `Statistics` is read only as far as the counters are concerned. Accesses
 * are recorded through the `StatisticsMutator` returned alongside it by the
 * constructors, which is meant to stay with the owning cache.
 *
 * The statistics are not safe for concurrent access. Callers sharing a
 * tracker across fibers must serialize access to it.
 *
 * @since 1.0.0
 * @category models
 */
export interface Statistics<Key> extends Statistics.Variance<Key> {
  /**
   * Returns the number of accesses recorded, whether the key was monitored
   * or not.
   */
  totalAccesses(): Effect.Effect<number>

  /**
   * Returns the number of hits recorded, whether the key was monitored or
   * not.
   */
  totalHits(): Effect.Effect<number>

  /**
   * Returns the number of misses recorded, whether the key was monitored or
   * not.
   */
  totalMisses(): Effect.Effect<number>

  /**
   * Returns the ratio of hits to accesses. The result is `NaN` while no
   * access has been recorded.
   */
  hitRate(): Effect.Effect<number>

  /**
   * Returns the ratio of misses to accesses. The result is `NaN` while no
   * access has been recorded.
   */
  missRate(): Effect.Effect<number>

  /**
   * Returns the statistics of the specified key, failing with an
   * `UnmonitoredKeyError` if the key is not monitored.
   */
  statsFor(key: Key): Effect.Effect<KeyStatistics.KeyStatistics, UnmonitoredKeyError>

  /**
   * Returns the number of hits recorded for the specified key.
   */
  hitsFor(key: Key): Effect.Effect<number, UnmonitoredKeyError>

  /**
   * Returns the number of misses recorded for the specified key.
   */
  missesFor(key: Key): Effect.Effect<number, UnmonitoredKeyError>

  /**
   * Returns the number of accesses recorded for the specified key.
   */
  accessesFor(key: Key): Effect.Effect<number, UnmonitoredKeyError>

  /**
   * Returns whether the specified key is monitored.
   */
  isMonitoring(key: Key): Effect.Effect<boolean>

  /**
   * Returns the number of monitored keys.
   */
  numberOfMonitoredKeys(): Effect.Effect<number>

  /**
   * Returns whether at least one key is monitored.
   */
  isMonitoringKeys(): Effect.Effect<boolean>

  /**
   * Returns the monitored keys, in no particular order.
   */
  monitoredKeys(): Effect.Effect<Chunk.Chunk<Key>>

  /**
   * Starts monitoring the specified key. Monitoring a key that is already
   * monitored keeps its counters.
   */
  monitor(key: Key): Effect.Effect<void>

  /**
   * Stops monitoring the specified key and discards its counters.
   */
  unmonitor(key: Key): Effect.Effect<void>

  /**
   * Stops monitoring all keys. The totals are kept.
   */
  unmonitorAll(): Effect.Effect<void>
}

/**
 * @since 1.0.0
 */
export declare namespace Statistics {
  /**
   * @since 1.0.0
   * @category models
   */
  export interface Variance<Key> {
    readonly [StatisticsTypeId]: {
      readonly _Key: (_: Key) => void
    }
  }
}

/**
 * Constructs new statistics monitoring no keys, together with the mutator
 * used to record accesses into them.
 *
 * @since 1.0.0
 * @category constructors
 */
export const empty: <Key>() => Effect.Effect<readonly [Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>]> =
  internal.empty

/**
 * Constructs new statistics monitoring the specified keys, together with the
 * mutator used to record accesses into them.
 *
 * @since 1.0.0
 * @category constructors
 */
export const make: <Key>(
  ...keys: Array<Key>
) => Effect.Effect<readonly [Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>]> = internal.make

/**
 * Constructs new statistics monitoring every key of the specified iterable,
 * together with the mutator used to record accesses into them.
 *
 * @since 1.0.0
 * @category constructors
 */
export const fromIterable: <Key>(
  keys: Iterable<Key>
) => Effect.Effect<readonly [Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>]> = internal.fromIterable

/**
 * Constructs new statistics monitoring the keys read from the specified
 * configuration.
 *
 * @since 1.0.0
 * @category constructors
 */
export const fromConfig: <Key>(
  config: Config.Config<Iterable<Key>>
) => Effect.Effect<
  readonly [Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>],
  ConfigError.ConfigError
> = internal.fromConfig

/**
 * The keys to monitor, read as a comma separated list from
 * `MONITORED_KEYS`. Blank entries are skipped, and an unset or blank value
 * means no keys.
 *
 * @since 1.0.0
 * @category config
 */
export const monitoredKeysConfig: Config.Config<ReadonlyArray<string>> = internal.monitoredKeysConfig

/**
 * @since 1.0.0
 * @category getters
 */
export const totalAccesses: <Key>(self: Statistics<Key>) => Effect.Effect<number> = internal.totalAccesses

/**
 * @since 1.0.0
 * @category getters
 */
export const totalHits: <Key>(self: Statistics<Key>) => Effect.Effect<number> = internal.totalHits

/**
 * @since 1.0.0
 * @category getters
 */
export const totalMisses: <Key>(self: Statistics<Key>) => Effect.Effect<number> = internal.totalMisses

/**
 * Returns the ratio of hits to accesses, `NaN` while no access has been
 * recorded.
 *
 * @since 1.0.0
 * @category getters
 */
export const hitRate: <Key>(self: Statistics<Key>) => Effect.Effect<number> = internal.hitRate

/**
 * Returns the ratio of misses to accesses, `NaN` while no access has been
 * recorded.
 *
 * @since 1.0.0
 * @category getters
 */
export const missRate: <Key>(self: Statistics<Key>) => Effect.Effect<number> = internal.missRate

/**
 * Returns the statistics of the specified key.
 *
 * @since 1.0.0
 * @category combinators
 */
export const statsFor: {
  <Key>(key: Key): (self: Statistics<Key>) => Effect.Effect<KeyStatistics.KeyStatistics, UnmonitoredKeyError>
  <Key>(self: Statistics<Key>, key: Key): Effect.Effect<KeyStatistics.KeyStatistics, UnmonitoredKeyError>
} = internal.statsFor

/**
 * @since 1.0.0
 * @category combinators
 */
export const hitsFor: {
  <Key>(key: Key): (self: Statistics<Key>) => Effect.Effect<number, UnmonitoredKeyError>
  <Key>(self: Statistics<Key>, key: Key): Effect.Effect<number, UnmonitoredKeyError>
} = internal.hitsFor

/**
 * @since 1.0.0
 * @category combinators
 */
export const missesFor: {
  <Key>(key: Key): (self: Statistics<Key>) => Effect.Effect<number, UnmonitoredKeyError>
  <Key>(self: Statistics<Key>, key: Key): Effect.Effect<number, UnmonitoredKeyError>
} = internal.missesFor

/**
 * @since 1.0.0
 * @category combinators
 */
export const accessesFor: {
  <Key>(key: Key): (self: Statistics<Key>) => Effect.Effect<number, UnmonitoredKeyError>
  <Key>(self: Statistics<Key>, key: Key): Effect.Effect<number, UnmonitoredKeyError>
} = internal.accessesFor

/**
 * @since 1.0.0
 * @category combinators
 */
export const isMonitoring: {
  <Key>(key: Key): (self: Statistics<Key>) => Effect.Effect<boolean>
  <Key>(self: Statistics<Key>, key: Key): Effect.Effect<boolean>
} = internal.isMonitoring

/**
 * @since 1.0.0
 * @category getters
 */
export const numberOfMonitoredKeys: <Key>(self: Statistics<Key>) => Effect.Effect<number> =
  internal.numberOfMonitoredKeys

/**
 * @since 1.0.0
 * @category getters
 */
export const isMonitoringKeys: <Key>(self: Statistics<Key>) => Effect.Effect<boolean> = internal.isMonitoringKeys

/**
 * @since 1.0.0
 * @category getters
 */
export const monitoredKeys: <Key>(self: Statistics<Key>) => Effect.Effect<Chunk.Chunk<Key>> = internal.monitoredKeys

/**
 * Starts monitoring the specified key. Counters of a key that is already
 * monitored are left untouched.
 *
 * @since 1.0.0
 * @category mutations
 */
export const monitor: {
  <Key>(key: Key): (self: Statistics<Key>) => Effect.Effect<void>
  <Key>(self: Statistics<Key>, key: Key): Effect.Effect<void>
} = internal.monitor

/**
 * Stops monitoring the specified key. Does nothing if the key is not
 * monitored.
 *
 * @since 1.0.0
 * @category mutations
 */
export const unmonitor: {
  <Key>(key: Key): (self: Statistics<Key>) => Effect.Effect<void>
  <Key>(self: Statistics<Key>, key: Key): Effect.Effect<void>
} = internal.unmonitor

/**
 * Stops monitoring all keys.
 *
 * @since 1.0.0
 * @category mutations
 */
export const unmonitorAll: <Key>(self: Statistics<Key>) => Effect.Effect<void> = internal.unmonitorAll
