/**
 * Agent configuration using Effect Config
 */
import { Config, ConfigError, Context, Duration, Either, Layer } from "effect"

// ============================================
// Types
// ============================================

export interface TimeOfDay {
  readonly hour: number
  readonly minute: number
}

/** A named daily period, e.g. morning 07:00-09:00 */
export interface PeakWindow {
  readonly name: string
  readonly start: TimeOfDay
  readonly end: TimeOfDay
}

/**
 * Monitoring and decision configuration
 */
export interface AgentConfig {
  readonly measurementInterval: Duration.Duration
  readonly bandTestDuration: Duration.Duration
  readonly bandTestSampleInterval: Duration.Duration
  readonly autoSwitchEnabled: boolean
  readonly degradationThreshold: number
  readonly peakWindows: readonly PeakWindow[]
  readonly optimizationTimes: readonly TimeOfDay[]
  readonly routerTimeout: Duration.Duration
  readonly switchSettle: Duration.Duration
  readonly bandMaskSettle: Duration.Duration
  readonly stopTimeout: Duration.Duration
  readonly defaultBands: readonly string[]
}

/**
 * Metric log locations and retention
 */
export interface StoreConfig {
  readonly csvPath: string
  readonly jsonPath: string
  readonly bandComparisonPath: string
  readonly maxLogSizeBytes: number
}

// ============================================
// Service tags
// ============================================

export class AgentConfigService extends Context.Tag("AgentConfigService")<
  AgentConfigService,
  AgentConfig
>() {}

export class StoreConfigService extends Context.Tag("StoreConfigService")<
  StoreConfigService,
  StoreConfig
>() {}

// ============================================
// Defaults
// ============================================

export const defaultAgentConfig: AgentConfig = {
  measurementInterval: Duration.seconds(30),
  bandTestDuration: Duration.seconds(300),
  bandTestSampleInterval: Duration.seconds(30),
  autoSwitchEnabled: true,
  degradationThreshold: 0.8,
  peakWindows: [
    { name: "morning", start: { hour: 7, minute: 0 }, end: { hour: 9, minute: 0 } },
    { name: "evening", start: { hour: 17, minute: 0 }, end: { hour: 19, minute: 0 } },
  ],
  optimizationTimes: [
    { hour: 7, minute: 0 },
    { hour: 17, minute: 0 },
    { hour: 10, minute: 0 },
    { hour: 20, minute: 0 },
  ],
  routerTimeout: Duration.seconds(10),
  switchSettle: Duration.seconds(10),
  bandMaskSettle: Duration.seconds(15),
  stopTimeout: Duration.seconds(5),
  defaultBands: ["Band 1", "Band 3", "Band 7", "Band 8", "Band 20", "Band 28", "Band 38", "Band 40"],
}

export const defaultStoreConfig: StoreConfig = {
  csvPath: "lte_metrics.csv",
  jsonPath: "lte_metrics.json",
  bandComparisonPath: "band_comparison.csv",
  maxLogSizeBytes: 1_000_000,
}

// ============================================
// Parsers
// ============================================

const TIME_PATTERN = /^(\d{1,2}):(\d{2})$/

export const parseTimeOfDay = (value: string): Either.Either<TimeOfDay, string> => {
  const match = TIME_PATTERN.exec(value.trim())
  if (match === null) {
    return Either.left(`Expected HH:MM, got "${value}"`)
  }
  const hour = Number(match[1])
  const minute = Number(match[2])
  if (hour > 23 || minute > 59) {
    return Either.left(`Time out of range: "${value}"`)
  }
  return Either.right({ hour, minute })
}

export const formatTimeOfDay = (time: TimeOfDay): string =>
  `${String(time.hour).padStart(2, "0")}:${String(time.minute).padStart(2, "0")}`

/**
 * Parse "07:00,17:00" into times of day
 */
export const parseTimesOfDay = (value: string): Either.Either<readonly TimeOfDay[], string> =>
  Either.all(
    value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map(parseTimeOfDay)
  )

/**
 * Parse "morning=07:00-09:00,evening=17:00-19:00" into peak windows
 */
export const parsePeakWindows = (value: string): Either.Either<readonly PeakWindow[], string> =>
  Either.all(
    value
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0)
      .map((part): Either.Either<PeakWindow, string> => {
        const [name, range] = part.split("=")
        if (!name || range === undefined) {
          return Either.left(`Expected name=HH:MM-HH:MM, got "${part}"`)
        }
        const [start, end] = range.split("-")
        if (start === undefined || end === undefined) {
          return Either.left(`Expected a HH:MM-HH:MM range in "${part}"`)
        }
        return Either.all({ start: parseTimeOfDay(start), end: parseTimeOfDay(end) }).pipe(
          Either.map((times) => ({ name: name.trim(), ...times }))
        )
      })
  )

const parseList = (value: string): readonly string[] =>
  value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)

const fromParser =
  <A>(name: string, parse: (value: string) => Either.Either<A, string>) =>
  (value: string): Either.Either<A, ConfigError.ConfigError> =>
    Either.mapLeft(parse(value), (message) => ConfigError.InvalidData([name], message))

const seconds = (name: string, fallback: Duration.Duration) =>
  Config.number(name).pipe(
    Config.validate({
      message: `${name} must not be negative`,
      validation: (n) => n >= 0,
    }),
    Config.map(Duration.seconds),
    Config.withDefault(fallback)
  )

// ============================================
// Environment loaders
// ============================================

/**
 * Load agent config from environment with defaults
 */
export const agentConfig: Config.Config<AgentConfig> = Config.all({
  measurementInterval: seconds("MEASUREMENT_INTERVAL_SECONDS", defaultAgentConfig.measurementInterval),
  bandTestDuration: seconds("BAND_TEST_DURATION_SECONDS", defaultAgentConfig.bandTestDuration),
  bandTestSampleInterval: seconds(
    "BAND_TEST_SAMPLE_INTERVAL_SECONDS",
    defaultAgentConfig.bandTestSampleInterval
  ),
  autoSwitchEnabled: Config.boolean("AUTO_SWITCH_ENABLED").pipe(
    Config.withDefault(defaultAgentConfig.autoSwitchEnabled)
  ),
  degradationThreshold: Config.number("AUTO_SWITCH_THRESHOLD").pipe(
    Config.validate({
      message: "AUTO_SWITCH_THRESHOLD must be in (0, 1]",
      validation: (n) => n > 0 && n <= 1,
    }),
    Config.withDefault(defaultAgentConfig.degradationThreshold)
  ),
  peakWindows: Config.string("PEAK_WINDOWS").pipe(
    Config.mapOrFail(fromParser("PEAK_WINDOWS", parsePeakWindows)),
    Config.withDefault(defaultAgentConfig.peakWindows)
  ),
  optimizationTimes: Config.string("OPTIMIZATION_TIMES").pipe(
    Config.mapOrFail(fromParser("OPTIMIZATION_TIMES", parseTimesOfDay)),
    Config.withDefault(defaultAgentConfig.optimizationTimes)
  ),
  routerTimeout: seconds("ROUTER_TIMEOUT_SECONDS", defaultAgentConfig.routerTimeout),
  switchSettle: seconds("SWITCH_SETTLE_SECONDS", defaultAgentConfig.switchSettle),
  bandMaskSettle: seconds("BAND_MASK_SETTLE_SECONDS", defaultAgentConfig.bandMaskSettle),
  stopTimeout: seconds("STOP_TIMEOUT_SECONDS", defaultAgentConfig.stopTimeout),
  defaultBands: Config.string("DEFAULT_BANDS").pipe(
    Config.map(parseList),
    Config.withDefault(defaultAgentConfig.defaultBands)
  ),
})

/**
 * Load store config from environment with defaults
 */
export const storeConfig: Config.Config<StoreConfig> = Config.all({
  csvPath: Config.string("METRICS_CSV_PATH").pipe(Config.withDefault(defaultStoreConfig.csvPath)),
  jsonPath: Config.string("METRICS_JSON_PATH").pipe(Config.withDefault(defaultStoreConfig.jsonPath)),
  bandComparisonPath: Config.string("BAND_COMPARISON_PATH").pipe(
    Config.withDefault(defaultStoreConfig.bandComparisonPath)
  ),
  maxLogSizeBytes: Config.integer("MAX_LOG_SIZE_BYTES").pipe(
    Config.validate({
      message: "MAX_LOG_SIZE_BYTES must be positive",
      validation: (n) => n > 0,
    }),
    Config.withDefault(defaultStoreConfig.maxLogSizeBytes)
  ),
})

// ============================================
// Layers
// ============================================

export const AgentConfigLive = Layer.effect(AgentConfigService, agentConfig)

export const StoreConfigLive = Layer.effect(StoreConfigService, storeConfig)
