/**
 * MonitorService - fixed-interval signal polling.
 *
 * Each tick reads a sample from the router, persists it, rotates the log when
 * it grew too large and hands the sample to the DecisionEngine. A failed tick
 * is logged and counted; the loop keeps going.
 */
import { Clock, Context, Deferred, Duration, Effect, Either, Fiber, Layer, Option, Ref, Scope } from "effect"
import { formatSampleStatus } from "@bandpilot/shared"
import {
  AgentConfigService,
  StoreConfigService,
  type AgentConfig,
  type StoreConfig,
} from "../config/AgentConfig.js"
import type { MetricRecord } from "../schema/Signal.js"
import { DecisionEngineTag, type DecisionEngine, type DegradationCheck } from "./DecisionEngine.js"
import { MetricStoreTag, type MetricStore } from "./MetricStore.js"
import {
  RouterClientTag,
  describeTransportFailure,
  withRouterTimeout,
  type RouterClient,
} from "./RouterClient.js"

// ============================================
// Types
// ============================================

export class MonitorError {
  readonly _tag = "MonitorError"
  constructor(
    readonly reason: "already_running" | "not_running",
    readonly message: string
  ) {}
}

export type TickResult =
  | {
      readonly _tag: "Recorded"
      readonly record: MetricRecord
      readonly rotated: boolean
      readonly check: DegradationCheck
    }
  | { readonly _tag: "NoSignal" }
  | { readonly _tag: "Failed"; readonly error: string }

export interface MonitorStats {
  readonly is_running: boolean
  readonly started_at: string | null
  readonly ticks: number
  readonly samples_recorded: number
  readonly failures: number
  readonly rotations: number
  readonly last_sample_at: string | null
  readonly last_error: string | null
}

export interface MonitorService {
  /**
   * Fork the polling loop
   */
  readonly start: () => Effect.Effect<void, MonitorError>

  /**
   * Signal the loop to stop and wait for it; false when it did not finish in time
   */
  readonly stop: () => Effect.Effect<boolean, MonitorError>

  /**
   * Run a single measurement cycle
   */
  readonly tick: () => Effect.Effect<TickResult>

  readonly getStats: () => Effect.Effect<MonitorStats>

  readonly isRunning: () => Effect.Effect<boolean>
}

export class MonitorServiceTag extends Context.Tag("MonitorService")<
  MonitorServiceTag,
  MonitorService
>() {}

export interface MonitorDeps {
  readonly config: AgentConfig
  readonly storeConfig: StoreConfig
  readonly router: RouterClient
  readonly store: MetricStore
  readonly engine: DecisionEngine
}

interface RunningLoop {
  readonly fiber: Fiber.RuntimeFiber<void>
  readonly stopSignal: Deferred.Deferred<void>
  readonly startedAt: Date
}

interface Counters {
  readonly ticks: number
  readonly samplesRecorded: number
  readonly failures: number
  readonly rotations: number
  readonly lastSampleAt: Date | null
  readonly lastError: string | null
}

// ============================================
// Implementation
// ============================================

/**
 * Build the monitor. The polling fiber lives in the surrounding scope and is
 * interrupted when that scope closes.
 */
export const makeMonitorService = ({
  config,
  storeConfig,
  router,
  store,
  engine,
}: MonitorDeps): Effect.Effect<MonitorService, never, Scope.Scope> =>
  Effect.gen(function* () {
    const scope = yield* Effect.scope
    const runningRef = yield* Ref.make<RunningLoop | null>(null)
    const countersRef = yield* Ref.make<Counters>({
      ticks: 0,
      samplesRecorded: 0,
      failures: 0,
      rotations: 0,
      lastSampleAt: null,
      lastError: null,
    })
    const controlLock = yield* Effect.makeSemaphore(1)

    const recordFailure = (error: string) =>
      Effect.gen(function* () {
        yield* Ref.update(countersRef, (c) => ({ ...c, failures: c.failures + 1, lastError: error }))
        yield* Effect.logWarning(`Monitor: ${error}`)
        return { _tag: "Failed", error } satisfies TickResult
      })

    const tick = (): Effect.Effect<TickResult> =>
      Effect.gen(function* () {
        yield* Ref.update(countersRef, (c) => ({ ...c, ticks: c.ticks + 1 }))

        const reading = yield* router
          .getSignalSample()
          .pipe(withRouterTimeout("getSignalSample", config.routerTimeout), Effect.either)
        if (Either.isLeft(reading)) {
          return yield* recordFailure(`Failed to get signal data: ${describeTransportFailure(reading.left)}`)
        }
        const sample = reading.right
        if (sample === null) {
          yield* Ref.update(countersRef, (c) => ({ ...c, failures: c.failures + 1, lastError: "No signal" }))
          yield* Effect.logWarning("Monitor: Router reported no signal")
          return { _tag: "NoSignal" } satisfies TickResult
        }

        const appended = yield* Effect.either(store.append(sample))
        if (Either.isLeft(appended)) {
          return yield* recordFailure(`Failed to persist sample: ${appended.left.message}`)
        }

        const rotated = yield* store.rotate(storeConfig.maxLogSizeBytes).pipe(
          Effect.catchAll((error) =>
            Effect.as(Effect.logError(`Monitor: Log rotation failed: ${error.message}`), false)
          )
        )

        const check = yield* engine.onSample(sample)

        yield* Ref.update(countersRef, (c) => ({
          ...c,
          samplesRecorded: c.samplesRecorded + 1,
          rotations: c.rotations + (rotated ? 1 : 0),
          lastSampleAt: sample.timestamp,
        }))
        yield* Effect.logInfo(formatSampleStatus(sample))

        return { _tag: "Recorded", record: appended.right, rotated, check } satisfies TickResult
      }).pipe(
        Effect.catchAllDefect((defect) => recordFailure(`Unexpected error: ${String(defect)}`))
      )

    const loop = (stopSignal: Deferred.Deferred<void>) =>
      Effect.gen(function* () {
        while (!(yield* Deferred.isDone(stopSignal))) {
          yield* tick()
          yield* Effect.race(Effect.sleep(config.measurementInterval), Deferred.await(stopSignal))
        }
        yield* Effect.logInfo("Monitor: Loop exited")
      })

    const monitor: MonitorService = {
      start: () =>
        Effect.gen(function* () {
          const existing = yield* Ref.get(runningRef)
          if (existing !== null) {
            return yield* Effect.fail(new MonitorError("already_running", "Monitor is already running"))
          }

          const stopSignal = yield* Deferred.make<void>()
          const startedAt = new Date(yield* Clock.currentTimeMillis)
          const fiber = yield* Effect.forkIn(loop(stopSignal), scope)
          yield* Ref.set(runningRef, { fiber, stopSignal, startedAt })
          yield* Effect.logInfo(`Monitor: Started, measuring every ${Duration.format(config.measurementInterval)}`)
        }).pipe(controlLock.withPermits(1)),

      stop: () =>
        Effect.gen(function* () {
          const running = yield* Ref.get(runningRef)
          if (running === null) {
            return yield* Effect.fail(new MonitorError("not_running", "Monitor is not running"))
          }

          yield* Effect.logInfo("Monitor: Stopping")
          yield* Deferred.succeed(running.stopSignal, undefined)
          const exit = yield* Fiber.await(running.fiber).pipe(Effect.timeoutOption(config.stopTimeout))
          yield* Ref.set(runningRef, null)

          if (Option.isNone(exit)) {
            yield* Effect.logWarning("Monitor: Loop did not finish in time, interrupting")
            yield* Fiber.interrupt(running.fiber)
            return false
          }
          yield* Effect.logInfo("Monitor: Stopped")
          return true
        }).pipe(controlLock.withPermits(1)),

      tick,

      getStats: () =>
        Effect.gen(function* () {
          const running = yield* Ref.get(runningRef)
          const counters = yield* Ref.get(countersRef)
          return {
            is_running: running !== null,
            started_at: running?.startedAt.toISOString() ?? null,
            ticks: counters.ticks,
            samples_recorded: counters.samplesRecorded,
            failures: counters.failures,
            rotations: counters.rotations,
            last_sample_at: counters.lastSampleAt?.toISOString() ?? null,
            last_error: counters.lastError,
          }
        }),

      isRunning: () => Effect.map(Ref.get(runningRef), (running) => running !== null),
    }

    return monitor
  })

// ============================================
// Layer
// ============================================

export const MonitorServiceLive = Layer.scoped(
  MonitorServiceTag,
  Effect.gen(function* () {
    const config = yield* AgentConfigService
    const storeConfig = yield* StoreConfigService
    const router = yield* RouterClientTag
    const store = yield* MetricStoreTag
    const engine = yield* DecisionEngineTag
    return yield* makeMonitorService({ config, storeConfig, router, store, engine })
  })
)
