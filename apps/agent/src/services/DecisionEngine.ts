/**
 * DecisionEngine - decides when and which band the router should use.
 *
 * Responsibilities:
 * - Degradation checks on every new sample (auto-switch)
 * - Smart switching to the best band of the last six hours
 * - Peak / off-peak optimization at scheduled times
 * - Full band tests that measure every catalog band in turn
 * - Band mask configuration
 *
 * Every router mutation runs under one switch lock, so at most one band change
 * is in flight at a time.
 */
import { Clock, Context, Duration, Effect, Either, Fiber, Layer, Ref } from "effect"
import { bandwidthScore } from "@bandpilot/shared"
import { AgentConfigService, type AgentConfig, type PeakWindow } from "../config/AgentConfig.js"
import type { BandAggregate, BandPerformance, SignalSample } from "../schema/Signal.js"
import { analyzeBand } from "./BandAnalyzer.js"
import { BandCatalogTag, ConfigurationError, type BandCatalog, type BandId } from "./BandCatalog.js"
import { MetricStoreTag, type MetricStore } from "./MetricStore.js"
import {
  RouterClientTag,
  TransportFailure,
  describeTransportFailure,
  withRouterTimeout,
  type RouterClient,
} from "./RouterClient.js"

// ============================================
// Error Types
// ============================================

export class BandTestInProgress {
  readonly _tag = "BandTestInProgress"
  constructor(readonly message: string) {}
}

// ============================================
// Result Types
// ============================================

export type DecisionPhase = "idle" | "testing" | "switching"

export type SwitchOutcome =
  | { readonly _tag: "NoData" }
  | { readonly _tag: "AlreadyActive"; readonly band: BandId }
  | { readonly _tag: "Busy"; readonly phase: DecisionPhase }
  | { readonly _tag: "Switched"; readonly from: string | null; readonly to: BandId }
  | { readonly _tag: "Failed"; readonly band: BandId; readonly reason: string }

export type DegradationCheck =
  | { readonly _tag: "Disabled" }
  | { readonly _tag: "NoHistory" }
  | {
      readonly _tag: "Healthy"
      readonly score: number
      readonly baseline: number
      readonly threshold: number
    }
  | {
      readonly _tag: "Degraded"
      readonly score: number
      readonly baseline: number
      readonly threshold: number
      readonly outcome: SwitchOutcome
    }

export interface PeakOptimization {
  readonly mode: "peak" | "off_peak"
  /** Name of the matching peak window, null off-peak */
  readonly window: string | null
  readonly outcome: SwitchOutcome
}

export type BandTestResult =
  | {
      readonly _tag: "Measured"
      readonly band: BandId
      readonly samples: number
      readonly performance: BandPerformance
    }
  | { readonly _tag: "Failed"; readonly band: BandId; readonly reason: string }

export interface BandTestReport {
  readonly startedAt: Date
  readonly finishedAt: Date
  readonly results: readonly BandTestResult[]
  readonly bestBand: BandId | null
}

export interface BandTestOptions {
  readonly bands?: readonly string[]
  readonly duration?: Duration.DurationInput
  readonly interval?: Duration.DurationInput
}

export interface SwitchRecord {
  readonly from: string | null
  readonly to: BandId
  readonly reason: string
  readonly at: Date
}

export interface BandTestStart {
  readonly bands: readonly BandId[]
  readonly fiber: Fiber.RuntimeFiber<BandTestReport>
}

export interface BandMaskResult {
  readonly accepted: boolean
  readonly bands: Readonly<Record<string, boolean>>
}

export interface DecisionStatus {
  readonly currentBestBand: BandId | null
  readonly autoSwitchEnabled: boolean
  readonly degradationThreshold: number
  readonly lastDecisionAt: Date | null
  readonly phase: DecisionPhase
  readonly lastSwitch: SwitchRecord | null
  readonly lastBandTest: BandTestReport | null
  readonly switchCount: number
}

// ============================================
// DecisionEngine Interface
// ============================================

export interface DecisionEngine {
  /**
   * Compare a fresh sample against the last hour and switch when it degraded
   */
  readonly onSample: (sample: SignalSample) => Effect.Effect<DegradationCheck>

  /**
   * Switch to the band with the best mean bandwidth score over six hours
   */
  readonly smartSwitch: () => Effect.Effect<SwitchOutcome>

  /**
   * Peak hours favour peak SINR, off-peak hours favour the steadiest band
   */
  readonly optimizeForPeakHours: (now?: Date) => Effect.Effect<PeakOptimization>

  readonly testAllBands: (
    options?: BandTestOptions
  ) => Effect.Effect<BandTestReport, ConfigurationError | BandTestInProgress>

  /**
   * Claim the testing phase and run the band test in the background
   */
  readonly startBandTest: (
    options?: BandTestOptions
  ) => Effect.Effect<BandTestStart, ConfigurationError | BandTestInProgress>

  /**
   * Manually lock the router to one catalog band
   */
  readonly switchToBand: (band: string) => Effect.Effect<SwitchOutcome, ConfigurationError>

  readonly setBandConfiguration: (
    input: unknown
  ) => Effect.Effect<BandMaskResult, ConfigurationError | TransportFailure>

  readonly getCurrentBandConfig: () => Effect.Effect<
    Readonly<Record<string, boolean>>,
    TransportFailure
  >

  readonly setAutoSwitch: (enabled: boolean) => Effect.Effect<void>

  readonly getStatus: () => Effect.Effect<DecisionStatus>
}

export class DecisionEngineTag extends Context.Tag("DecisionEngine")<
  DecisionEngineTag,
  DecisionEngine
>() {}

// ============================================
// Helpers
// ============================================

const SMART_SWITCH_WINDOW = Duration.hours(6)
const DEGRADATION_WINDOW = Duration.hours(1)

/** Window containing the given hour; minutes are ignored */
export const findPeakWindow = (
  windows: readonly PeakWindow[],
  now: Date
): PeakWindow | null => {
  const hour = now.getHours()
  return windows.find((w) => w.start.hour <= hour && hour <= w.end.hour) ?? null
}

/**
 * Catalog band whose aggregate ranks first by `score`; ties keep the earlier band
 */
const pickBand = (
  catalog: BandCatalog,
  aggregates: ReadonlyMap<string, BandAggregate>,
  score: (aggregate: BandAggregate) => number | null,
  prefer: "highest" | "lowest"
): BandId | null => {
  let best: BandId | null = null
  let bestScore = 0
  for (const [band, aggregate] of aggregates) {
    if (!catalog.has(band)) continue
    const value = score(aggregate)
    if (value === null) continue
    const better = prefer === "highest" ? value > bestScore : value < bestScore
    if (best === null || better) {
      best = band
      bestScore = value
    }
  }
  return best
}

interface EngineState {
  readonly currentBestBand: BandId | null
  readonly autoSwitchEnabled: boolean
  readonly lastDecisionAt: Date | null
  readonly phase: DecisionPhase
  readonly lastSwitch: SwitchRecord | null
  readonly lastBandTest: BandTestReport | null
  readonly switchCount: number
}

export interface DecisionEngineDeps {
  readonly config: AgentConfig
  readonly store: MetricStore
  readonly router: RouterClient
  readonly catalog: BandCatalog
}

// ============================================
// Implementation
// ============================================

export const makeDecisionEngine = ({
  config,
  store,
  router,
  catalog,
}: DecisionEngineDeps): Effect.Effect<DecisionEngine> =>
  Effect.gen(function* () {
    const stateRef = yield* Ref.make<EngineState>({
      currentBestBand: null,
      autoSwitchEnabled: config.autoSwitchEnabled,
      lastDecisionAt: null,
      phase: "idle",
      lastSwitch: null,
      lastBandTest: null,
      switchCount: 0,
    })
    const switchLock = yield* Effect.makeSemaphore(1)

    const now = Effect.map(Clock.currentTimeMillis, (ms) => new Date(ms))

    const markDecision = Effect.flatMap(now, (at) =>
      Ref.update(stateRef, (s) => ({ ...s, lastDecisionAt: at }))
    )

    /**
     * Band the router reports right now; null when it cannot say
     */
    const reportedBand = router.getSignalSample().pipe(
      withRouterTimeout("getSignalSample", config.routerTimeout),
      Effect.map((sample) => sample?.band ?? null),
      Effect.catchAll((error) =>
        Effect.as(
          Effect.logWarning(`Could not read current band: ${describeTransportFailure(error)}`),
          null
        )
      )
    )

    /**
     * Lock the router to one band and wait for it to settle. Caller holds the switch lock.
     */
    const lockBand = (band: BandId): Effect.Effect<Either.Either<true, string>> =>
      Effect.gen(function* () {
        const result = yield* router
          .setBand(band)
          .pipe(withRouterTimeout("setBand", config.routerTimeout), Effect.either)
        if (Either.isLeft(result)) {
          return Either.left(describeTransportFailure(result.left))
        }
        if (!result.right) {
          return Either.left(`Router refused to switch to ${band}`)
        }
        yield* Effect.sleep(config.switchSettle)
        return Either.right(true as const)
      })

    const claimSwitch = Ref.modify(stateRef, (s): [DecisionPhase | null, EngineState] =>
      s.phase === "idle" ? [null, { ...s, phase: "switching" }] : [s.phase, s]
    )

    const releaseSwitch = Ref.update(stateRef, (s): EngineState =>
      s.phase === "switching" ? { ...s, phase: "idle" } : s
    )

    /**
     * Switch to `target` unless the router is already on it
     */
    const applyChoice = (target: BandId, reason: string): Effect.Effect<SwitchOutcome> =>
      Effect.gen(function* () {
        const current = yield* reportedBand
        if (current === target) {
          yield* Ref.update(stateRef, (s) => ({ ...s, currentBestBand: target }))
          yield* Effect.logInfo(`Already on best band ${target}`)
          return { _tag: "AlreadyActive", band: target } satisfies SwitchOutcome
        }

        const busy = yield* claimSwitch
        if (busy !== null) {
          yield* Effect.logInfo(`Switch to ${target} skipped, engine is ${busy}`)
          return { _tag: "Busy", phase: busy } satisfies SwitchOutcome
        }

        return yield* Effect.gen(function* () {
          yield* Effect.logInfo(`Switching from ${current ?? "unknown"} to ${target} (${reason})`)
          const result = yield* switchLock.withPermits(1)(lockBand(target))
          if (Either.isLeft(result)) {
            yield* Effect.logError(`Failed to switch to ${target}: ${result.left}`)
            return { _tag: "Failed", band: target, reason: result.left } satisfies SwitchOutcome
          }

          const at = yield* now
          yield* Ref.update(stateRef, (s) => ({
            ...s,
            currentBestBand: target,
            lastSwitch: { from: current, to: target, reason, at },
            switchCount: s.switchCount + 1,
          }))
          yield* Effect.logInfo(`Switched to ${target}`)
          return { _tag: "Switched", from: current, to: target } satisfies SwitchOutcome
        }).pipe(Effect.ensuring(releaseSwitch))
      })

    const smartSwitch = (): Effect.Effect<SwitchOutcome> =>
      Effect.gen(function* () {
        const { phase } = yield* Ref.get(stateRef)
        if (phase === "testing") {
          return { _tag: "Busy", phase } satisfies SwitchOutcome
        }

        const aggregates = yield* store.perBandAggregate(SMART_SWITCH_WINDOW)
        const best = pickBand(catalog, aggregates, (a) => a.performance.avgBandwidthScore, "highest")
        yield* markDecision
        if (best === null) {
          yield* Effect.logWarning("No recent data for band comparison")
          return { _tag: "NoData" } satisfies SwitchOutcome
        }
        return yield* applyChoice(best, "best bandwidth score over 6h")
      })

    const onSample = (sample: SignalSample): Effect.Effect<DegradationCheck> =>
      Effect.gen(function* () {
        const { autoSwitchEnabled } = yield* Ref.get(stateRef)
        if (!autoSwitchEnabled) return { _tag: "Disabled" } satisfies DegradationCheck

        const summary = yield* store.summary(DEGRADATION_WINDOW)
        if (summary === null) return { _tag: "NoHistory" } satisfies DegradationCheck

        const score = bandwidthScore(sample.sinr, sample.rsrp)
        const baseline = summary.averageMetrics.bandwidthScore
        const threshold = baseline * config.degradationThreshold

        if (score < threshold) {
          yield* Effect.logWarning(
            `Performance degradation on ${sample.band}: score ${score.toFixed(3)} below ${threshold.toFixed(3)}`
          )
          const outcome = yield* smartSwitch()
          return { _tag: "Degraded", score, baseline, threshold, outcome } satisfies DegradationCheck
        }
        return { _tag: "Healthy", score, baseline, threshold } satisfies DegradationCheck
      })

    const optimizeForPeakHours = (at?: Date): Effect.Effect<PeakOptimization> =>
      Effect.gen(function* () {
        const instant = at ?? (yield* now)
        const window = findPeakWindow(config.peakWindows, instant)
        const aggregates = yield* store.perBandAggregate()
        yield* markDecision

        const best =
          window !== null
            ? pickBand(
                catalog,
                aggregates,
                (a) => (a.performance.peakSampleCount > 0 ? a.performance.peakPerformance : null),
                "highest"
              )
            : pickBand(catalog, aggregates, (a) => a.bandwidthScore.std, "lowest")

        const mode = window !== null ? "peak" : "off_peak"
        yield* Effect.logInfo(
          window !== null ? `Optimizing for ${window.name} peak` : "Optimizing for off-peak stability"
        )

        if (best === null) {
          yield* Effect.logWarning(`No data to optimize for ${mode} hours`)
          return {
            mode,
            window: window?.name ?? null,
            outcome: { _tag: "NoData" } satisfies SwitchOutcome,
          }
        }

        const { phase } = yield* Ref.get(stateRef)
        const outcome: SwitchOutcome =
          phase === "testing"
            ? { _tag: "Busy", phase }
            : yield* applyChoice(best, window !== null ? `${window.name} peak` : "off-peak stability")
        return { mode, window: window?.name ?? null, outcome }
      })

    /**
     * Switch to one band and collect samples from it
     */
    const measureBand = (
      band: BandId,
      rounds: number,
      interval: Duration.Duration
    ): Effect.Effect<BandTestResult> =>
      Effect.gen(function* () {
        yield* Effect.logInfo(`Testing ${band}`)
        const switched = yield* switchLock.withPermits(1)(lockBand(band))
        if (Either.isLeft(switched)) {
          yield* Effect.logWarning(`Skipping ${band}: ${switched.left}`)
          return { _tag: "Failed", band, reason: switched.left } satisfies BandTestResult
        }

        const samples: SignalSample[] = []
        for (let round = 0; round < rounds; round++) {
          const reading = yield* router
            .getSignalSample()
            .pipe(withRouterTimeout("getSignalSample", config.routerTimeout), Effect.either)

          if (Either.isLeft(reading)) {
            yield* Effect.logWarning(`Reading on ${band} failed: ${describeTransportFailure(reading.left)}`)
          } else if (reading.right !== null) {
            const sample: SignalSample = { ...reading.right, band }
            samples.push(sample)
            yield* store.append(sample).pipe(Effect.catchAll(() => Effect.void))
          }

          if (round < rounds - 1) {
            yield* Effect.sleep(interval)
          }
        }

        if (samples.length === 0) {
          return { _tag: "Failed", band, reason: "No samples collected" } satisfies BandTestResult
        }

        const performance = analyzeBand(band, samples)
        yield* Effect.logInfo(
          `${band}: avg SINR ${performance.avgSinr.toFixed(1)} dB, score ${performance.avgBandwidthScore.toFixed(3)}`
        )
        return { _tag: "Measured", band, samples: samples.length, performance } satisfies BandTestResult
      })

    /**
     * Validate the request and claim the testing phase; the returned effect
     * runs the test and releases the phase when it ends
     */
    const prepareBandTest = (
      options: BandTestOptions
    ): Effect.Effect<
      { readonly bands: readonly BandId[]; readonly run: Effect.Effect<BandTestReport> },
      ConfigurationError | BandTestInProgress
    > =>
      Effect.gen(function* () {
        const bands =
          options.bands === undefined ? catalog.bands : yield* catalog.parseAll(options.bands)
        if (bands.length === 0) {
          return yield* Effect.fail(new ConfigurationError("bands", "No bands to test"))
        }

        const duration = Duration.decode(options.duration ?? config.bandTestDuration)
        const interval = Duration.decode(options.interval ?? config.bandTestSampleInterval)
        const intervalMs = Duration.toMillis(interval)
        const rounds =
          intervalMs > 0 ? Math.max(1, Math.ceil(Duration.toMillis(duration) / intervalMs)) : 1

        const claimed = yield* Ref.modify(stateRef, (s): [boolean, EngineState] =>
          s.phase === "testing" ? [false, s] : [true, { ...s, phase: "testing" }]
        )
        if (!claimed) {
          return yield* Effect.fail(new BandTestInProgress("A band test is already running"))
        }

        const run = Effect.gen(function* () {
          const startedAt = yield* now
          yield* Effect.logInfo(
            `Band test started: ${bands.join(", ")} (${rounds} samples per band, every ${Duration.format(interval)})`
          )

          const results: BandTestResult[] = []
          for (const band of bands) {
            results.push(yield* measureBand(band, rounds, interval))
          }

          let bestBand: BandId | null = null
          let bestScore = -Infinity
          for (const result of results) {
            if (result._tag === "Measured" && result.performance.avgBandwidthScore > bestScore) {
              bestBand = result.band
              bestScore = result.performance.avgBandwidthScore
            }
          }

          const report: BandTestReport = { startedAt, finishedAt: yield* now, results, bestBand }
          yield* Ref.update(stateRef, (s) => ({
            ...s,
            lastBandTest: report,
            currentBestBand: bestBand ?? s.currentBestBand,
          }))
          yield* Effect.logInfo(`Band test complete, best band: ${bestBand ?? "none"}`)
          return report
        }).pipe(Effect.ensuring(Ref.update(stateRef, (s): EngineState => ({ ...s, phase: "idle" }))))

        return { bands, run }
      })

    const testAllBands = (
      options: BandTestOptions = {}
    ): Effect.Effect<BandTestReport, ConfigurationError | BandTestInProgress> =>
      Effect.flatMap(prepareBandTest(options), ({ run }) => run)

    const startBandTest = (
      options: BandTestOptions = {}
    ): Effect.Effect<BandTestStart, ConfigurationError | BandTestInProgress> =>
      Effect.gen(function* () {
        const { bands, run } = yield* prepareBandTest(options)
        const fiber = yield* Effect.forkDaemon(run)
        return { bands, fiber }
      })

    const switchToBand = (band: string): Effect.Effect<SwitchOutcome, ConfigurationError> =>
      Effect.gen(function* () {
        const target = yield* catalog.parse(band)
        const { phase } = yield* Ref.get(stateRef)
        yield* markDecision
        if (phase === "testing") {
          return { _tag: "Busy", phase } satisfies SwitchOutcome
        }
        return yield* applyChoice(target, "manual request")
      })

    const setBandConfiguration = (
      input: unknown
    ): Effect.Effect<BandMaskResult, ConfigurationError | TransportFailure> =>
      Effect.gen(function* () {
        const mask = yield* catalog.parseMask(input)
        const bands = Object.fromEntries(mask)
        const enabled = Array.from(mask).filter(([, on]) => on).map(([band]) => band)
        yield* Effect.logInfo(`Applying band mask: ${enabled.join(", ")}`)

        const accepted = yield* switchLock.withPermits(1)(
          Effect.gen(function* () {
            const ok = yield* router
              .setBandMask(mask)
              .pipe(withRouterTimeout("setBandMask", config.routerTimeout))
            if (ok) {
              yield* Effect.sleep(config.bandMaskSettle)
            }
            return ok
          })
        )

        if (accepted) {
          yield* Effect.logInfo("Band mask applied")
        } else {
          yield* Effect.logWarning("Router rejected band mask")
        }
        return { accepted, bands }
      })

    const engine: DecisionEngine = {
      onSample,
      smartSwitch,
      optimizeForPeakHours,
      testAllBands,
      startBandTest,
      switchToBand,
      setBandConfiguration,

      getCurrentBandConfig: () =>
        router
          .getCurrentBandConfig()
          .pipe(withRouterTimeout("getCurrentBandConfig", config.routerTimeout)),

      setAutoSwitch: (enabled) =>
        Effect.gen(function* () {
          yield* Ref.update(stateRef, (s) => ({ ...s, autoSwitchEnabled: enabled }))
          yield* Effect.logInfo(`Auto-switch ${enabled ? "enabled" : "disabled"}`)
        }),

      getStatus: () =>
        Effect.map(Ref.get(stateRef), (s) => ({
          ...s,
          degradationThreshold: config.degradationThreshold,
        })),
    }

    return engine
  })

// ============================================
// Layer
// ============================================

export const DecisionEngineLive = Layer.effect(
  DecisionEngineTag,
  Effect.gen(function* () {
    const config = yield* AgentConfigService
    const store = yield* MetricStoreTag
    const router = yield* RouterClientTag
    const catalog = yield* BandCatalogTag
    return yield* makeDecisionEngine({ config, store, router, catalog })
  })
)
