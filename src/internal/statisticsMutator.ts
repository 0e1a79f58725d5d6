import type * as Statistics from "cache-statistics/Statistics"
import type * as StatisticsMutator from "cache-statistics/StatisticsMutator"
import type * as Effect from "effect/Effect"
import { dual } from "effect/Function"

/** @internal */
const StatisticsMutatorSymbolKey = "cache-statistics/StatisticsMutator"

/** @internal */
export const StatisticsMutatorTypeId: StatisticsMutator.StatisticsMutatorTypeId = Symbol.for(
  StatisticsMutatorSymbolKey
) as StatisticsMutator.StatisticsMutatorTypeId

/** @internal */
export const statistics = <Key>(self: StatisticsMutator.StatisticsMutator<Key>): Statistics.Statistics<Key> =>
  self.statistics

/** @internal */
export const recordAccess = dual<
  <Key>(key: Key, isHit: boolean) => (self: StatisticsMutator.StatisticsMutator<Key>) => Effect.Effect<void>,
  <Key>(self: StatisticsMutator.StatisticsMutator<Key>, key: Key, isHit: boolean) => Effect.Effect<void>
>(3, (self, key, isHit) => self.recordAccess(key, isHit))

/** @internal */
export const recordHit = dual<
  <Key>(key: Key) => (self: StatisticsMutator.StatisticsMutator<Key>) => Effect.Effect<void>,
  <Key>(self: StatisticsMutator.StatisticsMutator<Key>, key: Key) => Effect.Effect<void>
>(2, (self, key) => self.recordHit(key))

/** @internal */
export const recordMiss = dual<
  <Key>(key: Key) => (self: StatisticsMutator.StatisticsMutator<Key>) => Effect.Effect<void>,
  <Key>(self: StatisticsMutator.StatisticsMutator<Key>, key: Key) => Effect.Effect<void>
>(2, (self, key) => self.recordMiss(key))
