import { ConfigProvider, Duration, Effect, Either } from "effect"
import { describe, expect, it } from "vitest"
import {
  agentConfig,
  defaultAgentConfig,
  defaultStoreConfig,
  formatTimeOfDay,
  parsePeakWindows,
  parseTimeOfDay,
  parseTimesOfDay,
  storeConfig,
} from "./AgentConfig.js"

const load = <A>(config: Effect.Effect<A, unknown>, env: Record<string, string> = {}) =>
  config.pipe(
    Effect.withConfigProvider(ConfigProvider.fromMap(new Map(Object.entries(env)))),
    Effect.either,
    Effect.runPromise
  )

describe("time parsing", () => {
  it("parses and formats HH:MM", () => {
    expect(parseTimeOfDay(" 7:05 ")).toEqual(Either.right({ hour: 7, minute: 5 }))
    expect(formatTimeOfDay({ hour: 7, minute: 5 })).toBe("07:05")
  })

  it("rejects malformed or out of range times", () => {
    expect(parseTimeOfDay("7pm")).toEqual(Either.left('Expected HH:MM, got "7pm"'))
    expect(parseTimeOfDay("24:00")).toEqual(Either.left('Time out of range: "24:00"'))
  })

  it("parses lists of times and skips empty entries", () => {
    expect(parseTimesOfDay("06:00, 18:30,")).toEqual(
      Either.right([
        { hour: 6, minute: 0 },
        { hour: 18, minute: 30 },
      ])
    )
  })

  it("parses named peak windows", () => {
    expect(parsePeakWindows("rush=06:30-08:00")).toEqual(
      Either.right([{ name: "rush", start: { hour: 6, minute: 30 }, end: { hour: 8, minute: 0 } }])
    )
    expect(Either.isLeft(parsePeakWindows("rush"))).toBe(true)
    expect(Either.isLeft(parsePeakWindows("rush=06:30"))).toBe(true)
  })
})

describe("agentConfig", () => {
  it("falls back to defaults", async () => {
    expect(await load(agentConfig)).toEqual(Either.right(defaultAgentConfig))
    expect(await load(storeConfig)).toEqual(Either.right(defaultStoreConfig))
  })

  it("reads overrides from the environment", async () => {
    const result = await load(agentConfig, {
      MEASUREMENT_INTERVAL_SECONDS: "5",
      AUTO_SWITCH_ENABLED: "false",
      AUTO_SWITCH_THRESHOLD: "0.5",
      OPTIMIZATION_TIMES: "06:00",
      PEAK_WINDOWS: "lunch=12:00-13:00",
      DEFAULT_BANDS: "B1, B3",
    })
    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      const config = result.right
      expect(Duration.toMillis(config.measurementInterval)).toBe(5000)
      expect(config.autoSwitchEnabled).toBe(false)
      expect(config.degradationThreshold).toBe(0.5)
      expect(config.optimizationTimes).toEqual([{ hour: 6, minute: 0 }])
      expect(config.peakWindows.map((w) => w.name)).toEqual(["lunch"])
      expect(config.defaultBands).toEqual(["B1", "B3"])
    }
  })

  it("rejects a threshold outside (0, 1]", async () => {
    expect(Either.isLeft(await load(agentConfig, { AUTO_SWITCH_THRESHOLD: "1.5" }))).toBe(true)
    expect(Either.isLeft(await load(agentConfig, { AUTO_SWITCH_THRESHOLD: "0" }))).toBe(true)
    expect(Either.isRight(await load(agentConfig, { AUTO_SWITCH_THRESHOLD: "1" }))).toBe(true)
  })

  it("rejects unparseable schedules and negative intervals", async () => {
    expect(Either.isLeft(await load(agentConfig, { OPTIMIZATION_TIMES: "noon" }))).toBe(true)
    expect(Either.isLeft(await load(agentConfig, { MEASUREMENT_INTERVAL_SECONDS: "-1" }))).toBe(true)
    expect(Either.isLeft(await load(storeConfig, { MAX_LOG_SIZE_BYTES: "0" }))).toBe(true)
  })
})
