/**
 * Test fixtures: a metric store in a scoped temp directory, the simulated
 * router and a decision engine wired together without settle delays.
 */
import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { Duration, Effect, Logger, LogLevel, Scope } from "effect"
import { defaultAgentConfig, type AgentConfig, type StoreConfig } from "../config/AgentConfig.js"
import type { SignalSample } from "../schema/Signal.js"
import { makeBandCatalog, type BandCatalog } from "../services/BandCatalog.js"
import { makeDecisionEngine, type DecisionEngine } from "../services/DecisionEngine.js"
import { makeMetricStore, type MetricStore } from "../services/MetricStore.js"
import {
  makeSimulatedRouter,
  type BandProfile,
  type SimulatedRouter,
} from "../services/SimulatedRouter.js"

export const TEST_BANDS = ["B1", "B3", "B7"]

export const TEST_PROFILES: Readonly<Record<string, BandProfile>> = {
  B1: { rsrp: -110, rsrq: -14, sinr: 0, rssi: -80 },
  B3: { rsrp: -85, rsrq: -10, sinr: 15, rssi: -65 },
  B7: { rsrp: -100, rsrq: -12, sinr: 5, rssi: -72 },
}

export interface AgentFixture {
  readonly config: AgentConfig
  readonly storeConfig: StoreConfig
  readonly store: MetricStore
  readonly router: SimulatedRouter
  readonly catalog: BandCatalog
  readonly engine: DecisionEngine
}

export interface FixtureOptions {
  readonly catalog?: readonly string[]
  readonly initialBand?: string
  readonly refusedBands?: readonly string[]
  readonly config?: Partial<AgentConfig>
  readonly maxLogSizeBytes?: number
}

export const testConfig = (overrides: Partial<AgentConfig> = {}): AgentConfig => ({
  ...defaultAgentConfig,
  switchSettle: Duration.zero,
  bandMaskSettle: Duration.zero,
  ...overrides,
})

/**
 * Build the fixture and run `body` with it, logging silenced
 */
export const runWithAgent = <A, E>(
  body: (fixture: AgentFixture) => Effect.Effect<A, E, FileSystem.FileSystem | Path.Path | Scope.Scope>,
  options: FixtureOptions = {}
): Promise<A> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const dir = yield* fs.makeTempDirectoryScoped()

    const storeConfig: StoreConfig = {
      csvPath: path.join(dir, "metrics.csv"),
      jsonPath: path.join(dir, "metrics.json"),
      bandComparisonPath: path.join(dir, "band_comparison.csv"),
      maxLogSizeBytes: options.maxLogSizeBytes ?? 1_000_000,
    }
    const config = testConfig(options.config)
    const bands = options.catalog ?? TEST_BANDS

    const store = yield* makeMetricStore(storeConfig)
    const router = yield* makeSimulatedRouter({
      bands,
      initialBand: options.initialBand ?? bands[0],
      profiles: TEST_PROFILES,
      refusedBands: options.refusedBands,
    })
    const catalog = makeBandCatalog(bands)
    const engine = yield* makeDecisionEngine({ config, store, router, catalog })

    return yield* body({ config, storeConfig, store, router, catalog, engine })
  }).pipe(
    Effect.scoped,
    Effect.provide(NodeContext.layer),
    Logger.withMinimumLogLevel(LogLevel.None),
    Effect.runPromise
  )

export const testSample = (
  band: string,
  at: Date,
  readings: { readonly sinr: number; readonly rsrp: number; readonly rsrq?: number }
): SignalSample => ({
  timestamp: at,
  band,
  rsrp: readings.rsrp,
  rsrq: readings.rsrq ?? -10,
  sinr: readings.sinr,
  rssi: readings.rsrp + 20,
  cellId: `cell-${band.toLowerCase()}`,
  plmn: "00101",
})

export const minutesAgo = (minutes: number): Date => new Date(Date.now() - minutes * 60_000)
