import { Effect, Logger, LogLevel, TestClock, TestContext } from "effect"
import { describe, expect, it } from "vitest"
import { testConfig } from "../testing/fixtures.js"
import type { TimeOfDay } from "../config/AgentConfig.js"
import type { DecisionEngine, PeakOptimization } from "./DecisionEngine.js"
import { makeOptimizationScheduler, msUntilNextRun } from "./OptimizationScheduler.js"

const HOUR = 3_600_000

describe("msUntilNextRun", () => {
  const times: TimeOfDay[] = [
    { hour: 7, minute: 0 },
    { hour: 17, minute: 0 },
    { hour: 10, minute: 0 },
    { hour: 20, minute: 0 },
  ]
  const at = (hour: number, minute = 0) => new Date(2024, 5, 12, hour, minute)

  it("picks the nearest upcoming time", () => {
    expect(msUntilNextRun(at(6, 30), times)).toBe(HOUR / 2)
    expect(msUntilNextRun(at(10, 15), times)).toBe(6 * HOUR + 45 * 60_000)
  })

  it("moves a time that is now to the next day", () => {
    expect(msUntilNextRun(at(7, 0), times)).toBe(3 * HOUR)
    expect(msUntilNextRun(at(17, 0), [{ hour: 17, minute: 0 }])).toBe(24 * HOUR)
  })

  it("wraps past the last time of the day", () => {
    expect(msUntilNextRun(at(21, 0), times)).toBe(10 * HOUR)
  })

  it("is null without times", () => {
    expect(msUntilNextRun(at(12), [])).toBeNull()
  })
})

const RESULT: PeakOptimization = { mode: "off_peak", window: null, outcome: { _tag: "NoData" } }

/** Engine stub recording when optimization was requested */
const recordingEngine = (calls: Date[], failFirst = false): DecisionEngine => ({
  onSample: () => Effect.dieMessage("not used"),
  smartSwitch: () => Effect.dieMessage("not used"),
  optimizeForPeakHours: (now) =>
    Effect.suspend((): Effect.Effect<PeakOptimization> => {
      calls.push(now ?? new Date(Number.NaN))
      return failFirst && calls.length === 1
        ? Effect.die(new RangeError("aggregate overflow"))
        : Effect.succeed(RESULT)
    }),
  testAllBands: () => Effect.dieMessage("not used"),
  startBandTest: () => Effect.dieMessage("not used"),
  switchToBand: () => Effect.dieMessage("not used"),
  setBandConfiguration: () => Effect.dieMessage("not used"),
  getCurrentBandConfig: () => Effect.dieMessage("not used"),
  setAutoSwitch: () => Effect.dieMessage("not used"),
  getStatus: () => Effect.dieMessage("not used"),
})

const runTest = <A, E>(effect: Effect.Effect<A, E, never>) =>
  effect.pipe(
    Effect.provide(TestContext.TestContext),
    Logger.withMinimumLogLevel(LogLevel.None),
    Effect.runPromise
  )

describe("OptimizationScheduler", () => {
  const times: TimeOfDay[] = [{ hour: 7, minute: 0 }]
  // the test clock starts at the epoch
  const firstDelay = msUntilNextRun(new Date(0), times) ?? 0

  it("fires at the configured time of day", async () => {
    const calls: Date[] = []
    const result = await runTest(
      Effect.gen(function* () {
        const scheduler = yield* makeOptimizationScheduler(
          testConfig({ optimizationTimes: times }),
          recordingEngine(calls)
        )
        yield* scheduler.start()
        while ((yield* scheduler.getStats()).next_run_at === null) {
          yield* Effect.yieldNow()
        }
        const scheduled = yield* scheduler.getStats()

        yield* TestClock.adjust(firstDelay - 1)
        const early = calls.length

        yield* TestClock.adjust(1)
        while ((yield* scheduler.getStats()).runs < 1) {
          yield* Effect.yieldNow()
        }
        const stats = yield* scheduler.getStats()
        const graceful = yield* scheduler.stop()
        return { scheduled, early, stats, graceful, after: yield* scheduler.getStats() }
      }).pipe(Effect.scoped)
    )

    expect(result.scheduled.is_running).toBe(true)
    expect(result.scheduled.times).toEqual(["07:00"])
    expect(result.scheduled.next_run_at).toBe(new Date(firstDelay).toISOString())
    expect(result.early).toBe(0)
    expect(calls.map((d) => d.getTime())).toEqual([firstDelay])
    expect(result.stats.runs).toBe(1)
    expect(result.stats.failures).toBe(0)
    expect(result.stats.last_run_at).toBe(new Date(firstDelay).toISOString())
    expect(result.stats.last_result).toEqual(RESULT)
    expect(result.graceful).toBe(true)
    expect(result.after.is_running).toBe(false)
    expect(result.after.next_run_at).toBeNull()
  })

  it("keeps its schedule after a failed run", async () => {
    const twoTimes: TimeOfDay[] = [
      { hour: 7, minute: 0 },
      { hour: 10, minute: 0 },
    ]
    const first = msUntilNextRun(new Date(0), twoTimes) ?? 0
    const second = msUntilNextRun(new Date(first), twoTimes) ?? 0
    const calls: Date[] = []

    const result = await runTest(
      Effect.gen(function* () {
        const scheduler = yield* makeOptimizationScheduler(
          testConfig({ optimizationTimes: twoTimes }),
          recordingEngine(calls, true)
        )
        yield* scheduler.start()
        while ((yield* scheduler.getStats()).next_run_at === null) {
          yield* Effect.yieldNow()
        }

        yield* TestClock.adjust(first)
        while ((yield* scheduler.getStats()).next_run_at !== new Date(first + second).toISOString()) {
          yield* Effect.yieldNow()
        }
        const afterFailure = yield* scheduler.getStats()

        yield* TestClock.adjust(second)
        while ((yield* scheduler.getStats()).runs < 1) {
          yield* Effect.yieldNow()
        }
        const afterRecovery = yield* scheduler.getStats()
        yield* scheduler.stop()
        return { afterFailure, afterRecovery }
      }).pipe(Effect.scoped)
    )

    expect(calls.map((d) => d.getTime())).toEqual([first, first + second])
    expect(result.afterFailure.is_running).toBe(true)
    expect(result.afterFailure.failures).toBe(1)
    expect(result.afterFailure.runs).toBe(0)
    expect(result.afterFailure.last_error).toContain("aggregate overflow")
    expect(result.afterRecovery.runs).toBe(1)
    expect(result.afterRecovery.failures).toBe(1)
    expect(result.afterRecovery.last_result).toEqual(RESULT)
  })

  it("refuses to start twice or stop when idle", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        const scheduler = yield* makeOptimizationScheduler(testConfig(), recordingEngine([]))
        const notRunning = yield* Effect.flip(scheduler.stop())
        yield* scheduler.start()
        const alreadyRunning = yield* Effect.flip(scheduler.start())
        yield* scheduler.stop()
        return { notRunning, alreadyRunning }
      }).pipe(Effect.scoped)
    )
    expect(result.notRunning.reason).toBe("not_running")
    expect(result.alreadyRunning.reason).toBe("already_running")
  })
})
