import type * as KeyStatistics from "cache-statistics/KeyStatistics"
import * as _keyStatistics from "cache-statistics/internal/keyStatistics"
import * as StatisticsState from "cache-statistics/internal/statisticsState"
import { StatisticsMutatorTypeId } from "cache-statistics/internal/statisticsMutator"
import type * as Statistics from "cache-statistics/Statistics"
import type * as StatisticsMutator from "cache-statistics/StatisticsMutator"
import { UnmonitoredKeyError } from "cache-statistics/UnmonitoredKeyError"
import * as Chunk from "effect/Chunk"
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Effect from "effect/Effect"
import { dual, pipe } from "effect/Function"
import * as MutableHashMap from "effect/MutableHashMap"
import * as Option from "effect/Option"

/** @internal */
const StatisticsSymbolKey = "cache-statistics/Statistics"

/** @internal */
export const StatisticsTypeId: Statistics.StatisticsTypeId = Symbol.for(
  StatisticsSymbolKey
) as Statistics.StatisticsTypeId

const keyVariance = {
  _Key: (_: unknown) => _
}

class StatisticsImpl<Key> implements Statistics.Statistics<Key> {
  readonly [StatisticsTypeId] = keyVariance
  readonly state: StatisticsState.StatisticsState<Key>
  constructor() {
    this.state = StatisticsState.initial()
  }

  totalAccesses(): Effect.Effect<number> {
    return Effect.sync(() => this.state.totalAccesses)
  }

  totalHits(): Effect.Effect<number> {
    return Effect.sync(() => this.state.totalHits)
  }

  totalMisses(): Effect.Effect<number> {
    return Effect.sync(() => this.state.totalAccesses - this.state.totalHits)
  }

  hitRate(): Effect.Effect<number> {
    // NaN until the first access is recorded
    return Effect.sync(() => this.state.totalHits / this.state.totalAccesses)
  }

  missRate(): Effect.Effect<number> {
    return Effect.map(this.hitRate(), (rate) => 1 - rate)
  }

  statsFor(key: Key): Effect.Effect<KeyStatistics.KeyStatistics, UnmonitoredKeyError> {
    return Effect.suspend(() => {
      const option = MutableHashMap.get(this.state.map, key)
      if (Option.isSome(option)) {
        return Effect.succeed(option.value)
      }
      return Effect.fail(new UnmonitoredKeyError({ key }))
    })
  }

  hitsFor(key: Key): Effect.Effect<number, UnmonitoredKeyError> {
    return Effect.map(this.statsFor(key), (stats) => stats.hits)
  }

  missesFor(key: Key): Effect.Effect<number, UnmonitoredKeyError> {
    return Effect.map(this.statsFor(key), (stats) => stats.misses)
  }

  accessesFor(key: Key): Effect.Effect<number, UnmonitoredKeyError> {
    return Effect.map(this.statsFor(key), _keyStatistics.accesses)
  }

  isMonitoring(key: Key): Effect.Effect<boolean> {
    return Effect.sync(() => MutableHashMap.has(this.state.map, key))
  }

  numberOfMonitoredKeys(): Effect.Effect<number> {
    return Effect.sync(() => MutableHashMap.size(this.state.map))
  }

  isMonitoringKeys(): Effect.Effect<boolean> {
    return Effect.sync(() => MutableHashMap.size(this.state.map) > 0)
  }

  monitoredKeys(): Effect.Effect<Chunk.Chunk<Key>> {
    return Effect.sync(() => {
      const keys: Array<Key> = []
      for (const entry of this.state.map) {
        keys.push(entry[0])
      }
      return Chunk.unsafeFromArray(keys)
    })
  }

  monitor(key: Key): Effect.Effect<void> {
    return pipe(
      Effect.suspend(() => {
        if (MutableHashMap.has(this.state.map, key)) {
          return Effect.void
        }
        MutableHashMap.set(this.state.map, key, _keyStatistics.make())
        return Effect.logDebug("Started monitoring key")
      }),
      Effect.annotateLogs("key", key)
    )
  }

  unmonitor(key: Key): Effect.Effect<void> {
    return pipe(
      Effect.suspend(() => {
        if (!MutableHashMap.has(this.state.map, key)) {
          return Effect.void
        }
        MutableHashMap.remove(this.state.map, key)
        return Effect.logDebug("Stopped monitoring key")
      }),
      Effect.annotateLogs("key", key)
    )
  }

  unmonitorAll(): Effect.Effect<void> {
    return Effect.suspend(() => {
      const size = MutableHashMap.size(this.state.map)
      this.state.map = MutableHashMap.empty()
      return pipe(
        Effect.logDebug("Stopped monitoring all keys"),
        Effect.annotateLogs("count", size)
      )
    })
  }
}

class StatisticsMutatorImpl<Key> implements StatisticsMutator.StatisticsMutator<Key> {
  readonly [StatisticsMutatorTypeId] = keyVariance
  constructor(readonly statistics: StatisticsImpl<Key>) {}

  recordAccess(key: Key, isHit: boolean): Effect.Effect<void> {
    return Effect.sync(() => {
      const state = this.statistics.state
      state.totalAccesses = state.totalAccesses + 1
      if (isHit) {
        state.totalHits = state.totalHits + 1
      }
      const option = MutableHashMap.get(state.map, key)
      if (Option.isSome(option)) {
        if (isHit) {
          _keyStatistics.trackHit(option.value)
        } else {
          _keyStatistics.trackMiss(option.value)
        }
      }
    })
  }

  recordHit(key: Key): Effect.Effect<void> {
    return this.recordAccess(key, true)
  }

  recordMiss(key: Key): Effect.Effect<void> {
    return this.recordAccess(key, false)
  }
}

/** @internal */
export const fromIterable = <Key>(
  keys: Iterable<Key>
): Effect.Effect<readonly [Statistics.Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>]> =>
  Effect.suspend(() => {
    const statistics = new StatisticsImpl<Key>()
    return pipe(
      Effect.forEach(keys, (key) => statistics.monitor(key), { discard: true }),
      Effect.as([statistics, new StatisticsMutatorImpl(statistics)] as const)
    )
  })

/** @internal */
export const make = <Key>(
  ...keys: Array<Key>
): Effect.Effect<readonly [Statistics.Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>]> =>
  fromIterable(keys)

/** @internal */
export const empty = <Key>(): Effect.Effect<
  readonly [Statistics.Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>]
> => fromIterable<Key>([])

/** @internal */
export const monitoredKeysConfig: Config.Config<ReadonlyArray<string>> = pipe(
  Config.array(Config.string(), "MONITORED_KEYS"),
  Config.map((keys) => keys.filter((key) => key.length > 0)),
  Config.withDefault([])
)

/** @internal */
export const fromConfig = <Key>(
  config: Config.Config<Iterable<Key>>
): Effect.Effect<
  readonly [Statistics.Statistics<Key>, StatisticsMutator.StatisticsMutator<Key>],
  ConfigError.ConfigError
> => Effect.flatMap(config, (keys) => fromIterable(keys))

/** @internal */
export const totalAccesses = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<number> => self.totalAccesses()

/** @internal */
export const totalHits = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<number> => self.totalHits()

/** @internal */
export const totalMisses = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<number> => self.totalMisses()

/** @internal */
export const hitRate = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<number> => self.hitRate()

/** @internal */
export const missRate = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<number> => self.missRate()

/** @internal */
export const statsFor = dual<
  <Key>(
    key: Key
  ) => (self: Statistics.Statistics<Key>) => Effect.Effect<KeyStatistics.KeyStatistics, UnmonitoredKeyError>,
  <Key>(self: Statistics.Statistics<Key>, key: Key) => Effect.Effect<KeyStatistics.KeyStatistics, UnmonitoredKeyError>
>(2, (self, key) => self.statsFor(key))

/** @internal */
export const hitsFor = dual<
  <Key>(key: Key) => (self: Statistics.Statistics<Key>) => Effect.Effect<number, UnmonitoredKeyError>,
  <Key>(self: Statistics.Statistics<Key>, key: Key) => Effect.Effect<number, UnmonitoredKeyError>
>(2, (self, key) => self.hitsFor(key))

/** @internal */
export const missesFor = dual<
  <Key>(key: Key) => (self: Statistics.Statistics<Key>) => Effect.Effect<number, UnmonitoredKeyError>,
  <Key>(self: Statistics.Statistics<Key>, key: Key) => Effect.Effect<number, UnmonitoredKeyError>
>(2, (self, key) => self.missesFor(key))

/** @internal */
export const accessesFor = dual<
  <Key>(key: Key) => (self: Statistics.Statistics<Key>) => Effect.Effect<number, UnmonitoredKeyError>,
  <Key>(self: Statistics.Statistics<Key>, key: Key) => Effect.Effect<number, UnmonitoredKeyError>
>(2, (self, key) => self.accessesFor(key))

/** @internal */
export const isMonitoring = dual<
  <Key>(key: Key) => (self: Statistics.Statistics<Key>) => Effect.Effect<boolean>,
  <Key>(self: Statistics.Statistics<Key>, key: Key) => Effect.Effect<boolean>
>(2, (self, key) => self.isMonitoring(key))

/** @internal */
export const numberOfMonitoredKeys = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<number> =>
  self.numberOfMonitoredKeys()

/** @internal */
export const isMonitoringKeys = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<boolean> =>
  self.isMonitoringKeys()

/** @internal */
export const monitoredKeys = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<Chunk.Chunk<Key>> =>
  self.monitoredKeys()

/** @internal */
export const monitor = dual<
  <Key>(key: Key) => (self: Statistics.Statistics<Key>) => Effect.Effect<void>,
  <Key>(self: Statistics.Statistics<Key>, key: Key) => Effect.Effect<void>
>(2, (self, key) => self.monitor(key))

/** @internal */
export const unmonitor = dual<
  <Key>(key: Key) => (self: Statistics.Statistics<Key>) => Effect.Effect<void>,
  <Key>(self: Statistics.Statistics<Key>, key: Key) => Effect.Effect<void>
>(2, (self, key) => self.unmonitor(key))

/** @internal */
export const unmonitorAll = <Key>(self: Statistics.Statistics<Key>): Effect.Effect<void> => self.unmonitorAll()
