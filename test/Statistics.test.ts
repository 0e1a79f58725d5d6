import * as Statistics from "cache-statistics/Statistics"
import * as it from "cache-statistics/test/utils/extend"
import * as Chunk from "effect/Chunk"
import * as ConfigProvider from "effect/ConfigProvider"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"
import * as HashMap from "effect/HashMap"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"
import * as Option from "effect/Option"
import * as fc from "fast-check"
import { describe, expect } from "vitest"

describe("Statistics", () => {
  it.effect("empty - starts with zero totals and no monitored keys", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.empty<string>()
      expect(yield* Statistics.totalAccesses(statistics)).toBe(0)
      expect(yield* Statistics.totalHits(statistics)).toBe(0)
      expect(yield* Statistics.totalMisses(statistics)).toBe(0)
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(0)
      expect(yield* Statistics.isMonitoringKeys(statistics)).toBe(false)
    }))

  it.effect("hitRate - is NaN before any access is recorded", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.empty<string>()
      expect(yield* Statistics.hitRate(statistics)).toBeNaN()
      expect(yield* Statistics.missRate(statistics)).toBeNaN()
    }))

  it.effect("make - monitors every key with zero counters", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.make("x", "y")
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(2)
      expect(yield* Statistics.isMonitoringKeys(statistics)).toBe(true)
      expect(yield* Statistics.isMonitoring(statistics, "x")).toBe(true)
      expect(yield* Statistics.isMonitoring(statistics, "y")).toBe(true)
      expect(yield* Statistics.hitsFor(statistics, "x")).toBe(0)
      expect(yield* Statistics.missesFor(statistics, "y")).toBe(0)
    }))

  it.effect("fromIterable - monitors each distinct element", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.fromIterable(new Set(["a", "b", "c"]))
      const [duplicates] = yield* Statistics.fromIterable(["a", "b", "a"])
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(3)
      expect(yield* Statistics.numberOfMonitoredKeys(duplicates)).toBe(2)
    }))

  it.effect("fromConfig - monitors the configured keys", () =>
    Effect.gen(function*() {
      const [statistics] = yield* pipe(
        Statistics.fromConfig(Statistics.monitoredKeysConfig),
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["MONITORED_KEYS", "a,b"]])))
      )
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(2)
      expect(yield* Statistics.isMonitoring(statistics, "a")).toBe(true)
      expect(yield* Statistics.isMonitoring(statistics, "b")).toBe(true)
    }))

  it.effect("fromConfig - monitors nothing when no keys are configured", () =>
    Effect.gen(function*() {
      const [statistics] = yield* pipe(
        Statistics.fromConfig(Statistics.monitoredKeysConfig),
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map()))
      )
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(0)
    }))

  it.effect("fromConfig - monitors nothing when the configured value is blank", () =>
    Effect.gen(function*() {
      const [statistics] = yield* pipe(
        Statistics.fromConfig(Statistics.monitoredKeysConfig),
        Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["MONITORED_KEYS", ""]])))
      )
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(0)
      expect(yield* Statistics.isMonitoringKeys(statistics)).toBe(false)
      expect(yield* Statistics.isMonitoring(statistics, "")).toBe(false)
    }))

  it.effect("logs structural changes at debug level", () =>
    Effect.gen(function*() {
      const entries: Array<{ message: string; key: unknown; count: unknown }> = []
      const logger = Logger.make(({ annotations, message }) => {
        entries.push({
          message: (Array.isArray(message) ? message : [message]).map(String).join(" "),
          key: Option.getOrUndefined(HashMap.get(annotations, "key")),
          count: Option.getOrUndefined(HashMap.get(annotations, "count"))
        })
      })
      yield* pipe(
        Effect.gen(function*() {
          const [statistics, mutator] = yield* Statistics.make("a")
          yield* Statistics.monitor(statistics, "a")
          yield* mutator.recordHit("a")
          yield* mutator.recordMiss("z")
          yield* Statistics.unmonitor(statistics, "a")
          yield* Statistics.unmonitor(statistics, "b")
          yield* Statistics.monitor(statistics, "c")
          yield* Statistics.unmonitorAll(statistics)
        }),
        Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
        Logger.withMinimumLogLevel(LogLevel.Debug)
      )
      expect(entries).toEqual([
        { message: "Started monitoring key", key: "a", count: undefined },
        { message: "Stopped monitoring key", key: "a", count: undefined },
        { message: "Started monitoring key", key: "c", count: undefined },
        { message: "Stopped monitoring all keys", key: undefined, count: 1 }
      ])
    }))

  it.effect("records accesses to unmonitored keys in the totals only", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.empty<string>()
      yield* mutator.recordAccess("a", true)
      expect(yield* Statistics.totalAccesses(statistics)).toBe(1)
      expect(yield* Statistics.totalHits(statistics)).toBe(1)
      expect(yield* Statistics.isMonitoring(statistics, "a")).toBe(false)
    }))

  it.effect("records hits and misses of a monitored key", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.make("a")
      yield* mutator.recordAccess("a", true)
      yield* mutator.recordAccess("a", false)
      expect(yield* Statistics.hitsFor(statistics, "a")).toBe(1)
      expect(yield* Statistics.missesFor(statistics, "a")).toBe(1)
      expect(yield* Statistics.accessesFor(statistics, "a")).toBe(2)
      expect(yield* Statistics.totalAccesses(statistics)).toBe(2)
      expect(yield* Statistics.hitRate(statistics)).toBe(0.5)
      expect(yield* Statistics.missRate(statistics)).toBe(0.5)
    }))

  it.effect("keeps monitored keys at zero while other keys are accessed", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.make("x", "y")
      yield* mutator.recordAccess("z", true)
      expect(yield* Statistics.totalHits(statistics)).toBe(1)
      expect(yield* Statistics.isMonitoring(statistics, "z")).toBe(false)
      expect(yield* Statistics.hitsFor(statistics, "x")).toBe(0)
    }))

  it.effect("totalMisses - is the difference of accesses and hits", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.empty<number>()
      yield* mutator.recordHit(1)
      yield* mutator.recordMiss(2)
      yield* mutator.recordMiss(3)
      yield* mutator.recordHit(4)
      expect(yield* Statistics.totalAccesses(statistics)).toBe(4)
      expect(yield* Statistics.totalHits(statistics)).toBe(2)
      expect(yield* Statistics.totalMisses(statistics)).toBe(2)
      expect(yield* Statistics.hitRate(statistics)).toBe(0.5)
    }))

  it.effect("monitor - keeps the counters of a key already monitored", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.make("a")
      yield* mutator.recordHit("a")
      yield* Statistics.monitor(statistics, "a")
      yield* Statistics.monitor(statistics, "a")
      expect(yield* Statistics.accessesFor(statistics, "a")).toBe(1)
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(1)
    }))

  it.effect("monitor - starts counting from the next access", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.empty<string>()
      yield* mutator.recordHit("a")
      yield* Statistics.monitor(statistics, "a")
      yield* mutator.recordMiss("a")
      expect(yield* Statistics.hitsFor(statistics, "a")).toBe(0)
      expect(yield* Statistics.missesFor(statistics, "a")).toBe(1)
      expect(yield* Statistics.totalAccesses(statistics)).toBe(2)
    }))

  it.effect("unmonitor - followed by monitor resets the counters", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.make("a")
      yield* mutator.recordHit("a")
      yield* mutator.recordMiss("a")
      yield* Statistics.unmonitor(statistics, "a")
      expect(yield* Statistics.isMonitoring(statistics, "a")).toBe(false)
      yield* Statistics.monitor(statistics, "a")
      expect(yield* Statistics.accessesFor(statistics, "a")).toBe(0)
      expect(yield* Statistics.totalAccesses(statistics)).toBe(2)
    }))

  it.effect("unmonitor - does nothing for a key that is not monitored", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.make("a")
      yield* Statistics.unmonitor(statistics, "b")
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(1)
    }))

  it.effect("unmonitorAll - removes every key and keeps the totals", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.make("a", "b")
      yield* mutator.recordHit("a")
      yield* mutator.recordMiss("b")
      yield* Statistics.unmonitorAll(statistics)
      expect(yield* Statistics.numberOfMonitoredKeys(statistics)).toBe(0)
      expect(yield* Statistics.isMonitoringKeys(statistics)).toBe(false)
      expect(yield* Statistics.totalAccesses(statistics)).toBe(2)
      expect(yield* Statistics.totalHits(statistics)).toBe(1)
      const error = yield* Effect.flip(Statistics.statsFor(statistics, "a"))
      expect(error._tag).toBe("UnmonitoredKeyError")
      expect(error.key).toBe("a")
    }))

  it.effect("statsFor - fails for a key that was never monitored", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.make("a")
      const errors = yield* Effect.all([
        Effect.flip(Statistics.statsFor(statistics, "b")),
        Effect.flip(Statistics.hitsFor(statistics, "b")),
        Effect.flip(Statistics.missesFor(statistics, "b")),
        Effect.flip(Statistics.accessesFor(statistics, "b"))
      ])
      for (const error of errors) {
        expect(error._tag).toBe("UnmonitoredKeyError")
        expect(error.key).toBe("b")
      }
    }))

  it.effect("statsFor - can be recovered as zero", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.empty<string>()
      const hits = yield* pipe(
        Statistics.hitsFor(statistics, "a"),
        Effect.catchTag("UnmonitoredKeyError", () => Effect.succeed(0))
      )
      expect(hits).toBe(0)
    }))

  it.effect("statsFor - stops advancing once the key is unmonitored", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.make("a")
      const stats = yield* Statistics.statsFor(statistics, "a")
      yield* mutator.recordHit("a")
      expect(stats.hits).toBe(1)
      yield* Statistics.unmonitor(statistics, "a")
      yield* mutator.recordHit("a")
      expect(stats.hits).toBe(1)
      expect(stats.accesses()).toBe(1)
    }))

  it.effect("monitoredKeys - returns every monitored key", () =>
    Effect.gen(function*() {
      const [statistics] = yield* Statistics.make("b", "a", "c")
      yield* Statistics.unmonitor(statistics, "c")
      const keys = yield* Statistics.monitoredKeys(statistics)
      expect(Chunk.toReadonlyArray(keys).slice().sort()).toEqual(["a", "b"])
    }))

  it.effect("compares keys structurally", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.make(Data.struct({ id: 1 }))
      yield* mutator.recordHit(Data.struct({ id: 1 }))
      yield* mutator.recordMiss(Data.struct({ id: 2 }))
      expect(yield* Statistics.hitsFor(statistics, Data.struct({ id: 1 }))).toBe(1)
      expect(yield* Statistics.isMonitoring(statistics, Data.struct({ id: 2 }))).toBe(false)
      expect(yield* Statistics.totalAccesses(statistics)).toBe(2)
    }))

  it.effect("supports data-last usage", () =>
    Effect.gen(function*() {
      const [statistics, mutator] = yield* Statistics.empty<string>()
      yield* pipe(statistics, Statistics.monitor("a"))
      yield* mutator.recordHit("a")
      expect(yield* pipe(statistics, Statistics.hitsFor("a"))).toBe(1)
      expect(yield* pipe(statistics, Statistics.isMonitoring("a"))).toBe(true)
      yield* pipe(statistics, Statistics.unmonitor("a"))
      expect(yield* pipe(statistics, Statistics.isMonitoring("a"))).toBe(false)
    }))

  it.it("totals and per-key counters stay consistent", () =>
    fc.assert(fc.asyncProperty(
      fc.array(fc.tuple(fc.constantFrom("a", "b", "c", "d"), fc.boolean())),
      (accesses) => {
        const program = Effect.gen(function*() {
          const [statistics, mutator] = yield* Statistics.make("a", "b")
          for (const [key, isHit] of accesses) {
            yield* mutator.recordAccess(key, isHit)
          }
          const total = yield* Statistics.totalAccesses(statistics)
          const hits = yield* Statistics.totalHits(statistics)
          expect(total).toBe(accesses.length)
          expect(hits).toBe(accesses.filter(([, isHit]) => isHit).length)
          expect(hits).toBeLessThanOrEqual(total)
          expect(yield* Statistics.totalMisses(statistics)).toBe(total - hits)
          for (const key of ["a", "b"]) {
            const accessesFor = yield* Statistics.accessesFor(statistics, key)
            const hitsFor = yield* Statistics.hitsFor(statistics, key)
            const missesFor = yield* Statistics.missesFor(statistics, key)
            expect(accessesFor).toBe(hitsFor + missesFor)
            expect(accessesFor).toBe(accesses.filter(([k]) => k === key).length)
            expect(accessesFor).toBeLessThanOrEqual(total)
          }
          expect(yield* Statistics.isMonitoring(statistics, "c")).toBe(false)
        })
        return Effect.runPromise(program)
      }
    )))
})
