/**
 * OptimizationScheduler - runs peak / off-peak optimization at fixed times of day.
 */
import { Cause, Clock, Context, Deferred, Duration, Effect, Fiber, Layer, Option, Ref, Scope } from "effect"
import { AgentConfigService, formatTimeOfDay, type AgentConfig, type TimeOfDay } from "../config/AgentConfig.js"
import { DecisionEngineTag, type DecisionEngine, type PeakOptimization } from "./DecisionEngine.js"

// ============================================
// Types
// ============================================

export class SchedulerError {
  readonly _tag = "SchedulerError"
  constructor(
    readonly reason: "already_running" | "not_running",
    readonly message: string
  ) {}
}

export interface OptimizerStats {
  readonly is_running: boolean
  readonly times: readonly string[]
  readonly runs: number
  readonly failures: number
  readonly last_run_at: string | null
  readonly next_run_at: string | null
  readonly last_result: PeakOptimization | null
  readonly last_error: string | null
}

export interface OptimizationScheduler {
  readonly start: () => Effect.Effect<void, SchedulerError>
  /**
   * Cancel the schedule; false when an in-flight optimization had to be interrupted
   */
  readonly stop: () => Effect.Effect<boolean, SchedulerError>
  readonly getStats: () => Effect.Effect<OptimizerStats>
}

export class OptimizationSchedulerTag extends Context.Tag("OptimizationScheduler")<
  OptimizationSchedulerTag,
  OptimizationScheduler
>() {}

// ============================================
// Helpers
// ============================================

/**
 * Milliseconds from `now` to the next configured local time of day.
 * A time equal to `now` is scheduled for the following day.
 */
export const msUntilNextRun = (now: Date, times: readonly TimeOfDay[]): number | null => {
  let best: number | null = null
  for (const time of times) {
    const next = new Date(now.getTime())
    next.setHours(time.hour, time.minute, 0, 0)
    if (next.getTime() <= now.getTime()) {
      next.setDate(next.getDate() + 1)
    }
    const delay = next.getTime() - now.getTime()
    if (best === null || delay < best) {
      best = delay
    }
  }
  return best
}

interface RunningSchedule {
  readonly fiber: Fiber.RuntimeFiber<void>
  readonly stopSignal: Deferred.Deferred<void>
}

interface ScheduleState {
  readonly runs: number
  readonly failures: number
  readonly lastRunAt: Date | null
  readonly nextRunAt: Date | null
  readonly lastResult: PeakOptimization | null
  readonly lastError: string | null
}

// ============================================
// Implementation
// ============================================

export const makeOptimizationScheduler = (
  config: AgentConfig,
  engine: DecisionEngine
): Effect.Effect<OptimizationScheduler, never, Scope.Scope> =>
  Effect.gen(function* () {
    const scope = yield* Effect.scope
    const runningRef = yield* Ref.make<RunningSchedule | null>(null)
    const stateRef = yield* Ref.make<ScheduleState>({
      runs: 0,
      failures: 0,
      lastRunAt: null,
      nextRunAt: null,
      lastResult: null,
      lastError: null,
    })

    // A failed run is recorded and the schedule continues
    const runOnce = (ranAt: Date) =>
      engine.optimizeForPeakHours(ranAt).pipe(
        Effect.flatMap((result) =>
          Effect.zipRight(
            Ref.update(stateRef, (s) => ({
              ...s,
              runs: s.runs + 1,
              lastRunAt: ranAt,
              lastResult: result,
            })),
            Effect.logInfo(`Optimizer: ${result.mode} optimization finished with ${result.outcome._tag}`)
          )
        ),
        Effect.catchAllCause((cause) =>
          Effect.gen(function* () {
            const message = Cause.pretty(cause)
            yield* Ref.update(stateRef, (s) => ({
              ...s,
              failures: s.failures + 1,
              lastRunAt: ranAt,
              lastError: message,
            }))
            yield* Effect.logError(`Optimizer: Optimization failed: ${message}`)
          })
        )
      )

    const loop = (stopSignal: Deferred.Deferred<void>) =>
      Effect.gen(function* () {
        while (!(yield* Deferred.isDone(stopSignal))) {
          const now = yield* Clock.currentTimeMillis
          const delay = msUntilNextRun(new Date(now), config.optimizationTimes)
          if (delay === null) {
            yield* Effect.logWarning("Optimizer: No optimization times configured")
            return
          }

          const nextRunAt = new Date(now + delay)
          yield* Ref.update(stateRef, (s) => ({ ...s, nextRunAt }))
          yield* Effect.logDebug(`Optimizer: Next run at ${nextRunAt.toISOString()}`)

          const due = yield* Effect.race(
            Effect.as(Effect.sleep(Duration.millis(delay)), true),
            Effect.as(Deferred.await(stopSignal), false)
          )
          if (!due) break

          const ranAt = new Date(yield* Clock.currentTimeMillis)
          yield* runOnce(ranAt)
        }
      }).pipe(Effect.ensuring(Ref.update(stateRef, (s) => ({ ...s, nextRunAt: null }))))

    const scheduler: OptimizationScheduler = {
      start: () =>
        Effect.gen(function* () {
          if ((yield* Ref.get(runningRef)) !== null) {
            return yield* Effect.fail(new SchedulerError("already_running", "Optimizer is already running"))
          }
          const stopSignal = yield* Deferred.make<void>()
          const fiber = yield* Effect.forkIn(loop(stopSignal), scope)
          yield* Ref.set(runningRef, { fiber, stopSignal })
          yield* Effect.logInfo(
            `Optimizer: Scheduled at ${config.optimizationTimes.map(formatTimeOfDay).join(", ")}`
          )
        }),

      stop: () =>
        Effect.gen(function* () {
          const running = yield* Ref.get(runningRef)
          if (running === null) {
            return yield* Effect.fail(new SchedulerError("not_running", "Optimizer is not running"))
          }
          yield* Deferred.succeed(running.stopSignal, undefined)
          const exit = yield* Fiber.await(running.fiber).pipe(Effect.timeoutOption(config.stopTimeout))
          yield* Ref.set(runningRef, null)
          if (Option.isNone(exit)) {
            yield* Fiber.interrupt(running.fiber)
            yield* Effect.logWarning("Optimizer: Interrupted running optimization")
            return false
          }
          yield* Effect.logInfo("Optimizer: Stopped")
          return true
        }),

      getStats: () =>
        Effect.gen(function* () {
          const running = yield* Ref.get(runningRef)
          const state = yield* Ref.get(stateRef)
          return {
            is_running: running !== null,
            times: config.optimizationTimes.map(formatTimeOfDay),
            runs: state.runs,
            failures: state.failures,
            last_run_at: state.lastRunAt?.toISOString() ?? null,
            next_run_at: state.nextRunAt?.toISOString() ?? null,
            last_result: state.lastResult,
            last_error: state.lastError,
          }
        }),
    }

    return scheduler
  })

export const OptimizationSchedulerLive = Layer.scoped(
  OptimizationSchedulerTag,
  Effect.gen(function* () {
    const config = yield* AgentConfigService
    const engine = yield* DecisionEngineTag
    return yield* makeOptimizationScheduler(config, engine)
  })
)
