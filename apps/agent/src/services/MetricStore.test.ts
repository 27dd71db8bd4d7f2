import { FileSystem, Path } from "@effect/platform"
import { NodeContext } from "@effect/platform-node"
import { Effect, Logger, LogLevel } from "effect"
import { describe, expect, it } from "vitest"
import { bandwidthScore } from "@bandpilot/shared"
import type { StoreConfig } from "../config/AgentConfig.js"
import { METRIC_COLUMNS, type SignalSample } from "../schema/Signal.js"
import { encodeCsvRow, makeMetricStore, parseCsv, type MetricStore } from "./MetricStore.js"

const HEADER = `${METRIC_COLUMNS.join(",")}\n`

const sample = (at: Date, sinr = 15, band = "Band 3"): SignalSample => ({
  timestamp: at,
  band,
  rsrp: -85,
  rsrq: -10,
  sinr,
  rssi: -65,
  cellId: "cell-b3",
  plmn: "00101",
})

interface Fixture {
  readonly store: MetricStore
  readonly config: StoreConfig
  readonly fs: FileSystem.FileSystem
}

/**
 * Run `body` against a store in a fresh temporary directory
 */
const withStore = <A, E>(
  body: (fixture: Fixture) => Effect.Effect<A, E, FileSystem.FileSystem | Path.Path>,
  prepare?: (config: StoreConfig, fs: FileSystem.FileSystem) => Effect.Effect<void, unknown>
) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path
    const dir = yield* fs.makeTempDirectoryScoped()
    const config: StoreConfig = {
      csvPath: path.join(dir, "metrics.csv"),
      jsonPath: path.join(dir, "metrics.json"),
      bandComparisonPath: path.join(dir, "band_comparison.csv"),
      maxLogSizeBytes: 1_000_000,
    }
    if (prepare) yield* prepare(config, fs)
    const store = yield* makeMetricStore(config)
    return yield* body({ store, config, fs })
  }).pipe(
    Effect.scoped,
    Effect.provide(NodeContext.layer),
    Logger.withMinimumLogLevel(LogLevel.None),
    Effect.runPromise
  )

const minutesAgo = (minutes: number) => new Date(Date.now() - minutes * 60_000)

describe("csv helpers", () => {
  it("quotes cells containing separators", () => {
    expect(encodeCsvRow(["a,b", 'say "hi"', 1])).toBe('"a,b","say ""hi""",1\n')
  })

  it("parses quoted cells across lines", () => {
    expect(parseCsv('a,"b,c","d""e"\n"x\ny",z\n')).toEqual([
      ["a", "b,c", 'd"e'],
      ["x\ny", "z"],
    ])
  })

  it("accepts CRLF line endings and a missing final newline", () => {
    expect(parseCsv("a,b\r\nc,d")).toEqual([
      ["a", "b"],
      ["c", "d"],
    ])
  })
})

describe("MetricStore", () => {
  it("starts with a header-only log and an empty mirror", async () => {
    const [csv, json, count] = await withStore(({ store, config, fs }) =>
      Effect.all([fs.readFileString(config.csvPath), fs.readFileString(config.jsonPath), store.count()])
    )
    expect(csv).toBe(HEADER)
    expect(JSON.parse(json)).toEqual([])
    expect(count).toBe(0)
  })

  it("appends the same row to the log and the mirror", async () => {
    const first = new Date("2024-03-01T10:00:00.000Z")
    const second = new Date("2024-03-01T10:00:30.000Z")

    const { csv, json, records } = await withStore(({ store, config, fs }) =>
      Effect.gen(function* () {
        yield* store.append(sample(first))
        yield* store.append(sample(second, 5))
        return {
          csv: yield* fs.readFileString(config.csvPath),
          json: yield* fs.readFileString(config.jsonPath),
          records: yield* store.records(),
        }
      })
    )

    const lines = csv.split("\n")
    expect(lines[0]).toBe(METRIC_COLUMNS.join(","))
    expect(lines[1]).toBe(
      `2024-03-01T10:00:00.000Z,Band 3,-85,-10,15,-65,cell-b3,00101,excellent,${bandwidthScore(15, -85)}`
    )
    expect(lines).toHaveLength(4)
    expect(lines[3]).toBe("")

    expect(JSON.parse(json)).toEqual(records)
    expect(records.map((r) => r.timestamp)).toEqual([first.toISOString(), second.toISOString()])
    expect(records[1].bandwidth_score).toBeCloseTo(bandwidthScore(5, -85), 12)
  })

  it("rejects a sample older than the last one", async () => {
    const { error, count, csv } = await withStore(({ store, config, fs }) =>
      Effect.gen(function* () {
        yield* store.append(sample(new Date("2024-03-01T10:00:30.000Z")))
        const error = yield* Effect.flip(store.append(sample(new Date("2024-03-01T10:00:00.000Z"))))
        return { error, count: yield* store.count(), csv: yield* fs.readFileString(config.csvPath) }
      })
    )
    expect(error._tag).toBe("PersistenceFailure")
    expect(error.reason).toBe("out_of_order")
    expect(count).toBe(1)
    expect(csv.trimEnd().split("\n")).toHaveLength(2)
  })

  it("accepts samples with equal timestamps", async () => {
    const at = new Date("2024-03-01T10:00:00.000Z")
    const count = await withStore(({ store }) =>
      Effect.gen(function* () {
        yield* store.appendBatch([sample(at), sample(at)])
        return yield* store.count()
      })
    )
    expect(count).toBe(2)
  })

  it("rejects non-numeric readings", async () => {
    const error = await withStore(({ store }) =>
      Effect.flip(store.append({ ...sample(new Date()), sinr: Number.NaN }))
    )
    expect(error.reason).toBe("invalid_sample")
  })

  it("stops a batch at the first failure", async () => {
    const { error, count } = await withStore(({ store }) =>
      Effect.gen(function* () {
        const error = yield* Effect.flip(
          store.appendBatch([
            sample(new Date("2024-03-01T10:00:00.000Z")),
            sample(new Date("2024-03-01T09:00:00.000Z")),
            sample(new Date("2024-03-01T11:00:00.000Z")),
          ])
        )
        return { error, count: yield* store.count() }
      })
    )
    expect(error.reason).toBe("out_of_order")
    expect(count).toBe(1)
  })

  it("reloads the log on startup and skips malformed rows", async () => {
    const valid = "2024-03-01T10:00:00.000Z,Band 3,-85,-10,15,-65,cell-b3,00101,excellent,0.858"
    const { records, json } = await withStore(
      ({ store, config, fs }) =>
        Effect.gen(function* () {
          return {
            records: yield* store.records(),
            json: yield* fs.readFileString(config.jsonPath),
          }
        }),
      (config, fs) =>
        fs.writeFileString(
          config.csvPath,
          [
            HEADER.trimEnd(),
            valid,
            "garbage,row",
            "2024-03-01T10:01:00.000Z,Band 3,-85,-10,15,-65,cell-b3,00101,superb,0.858",
            "not-a-date,Band 3,-85,-10,15,-65,cell-b3,00101,good,0.858",
            "",
          ].join("\n")
        )
    )

    expect(records).toEqual([
      {
        timestamp: "2024-03-01T10:00:00.000Z",
        band: "Band 3",
        rsrp: -85,
        rsrq: -10,
        sinr: 15,
        rssi: -65,
        cell_id: "cell-b3",
        plmn: "00101",
        signal_quality: "excellent",
        bandwidth_score: 0.858,
      },
    ])
    expect(JSON.parse(json)).toEqual(records)
  })

  it("summarizes only samples inside the window", async () => {
    const { hour, empty } = await withStore(({ store }) =>
      Effect.gen(function* () {
        yield* store.append(sample(minutesAgo(120), 0))
        yield* store.append(sample(minutesAgo(30), 20))
        yield* store.append(sample(minutesAgo(1), 10))
        return {
          hour: yield* store.summary("1 hour"),
          empty: yield* store.summary("10 seconds"),
        }
      })
    )

    expect(hour?.totalRecords).toBe(2)
    expect(hour?.averageMetrics.sinr).toBe(15)
    expect(hour?.windowSeconds).toBe(3600)
    expect(empty).toBeNull()
  })

  it("aggregates per band over a window or the whole log", async () => {
    const { recent, all } = await withStore(({ store }) =>
      Effect.gen(function* () {
        yield* store.append(sample(minutesAgo(600), 5, "Band 7"))
        yield* store.append(sample(minutesAgo(60), 20))
        yield* store.append(sample(minutesAgo(30), 10))
        return {
          recent: yield* store.perBandAggregate("6 hours"),
          all: yield* store.perBandAggregate(),
        }
      })
    )

    expect(Array.from(recent.keys())).toEqual(["Band 3"])
    expect(recent.get("Band 3")?.count).toBe(2)
    expect(Array.from(all.keys())).toEqual(["Band 3", "Band 7"])
  })

  it("returns the same aggregates when nothing was appended in between", async () => {
    const result = await withStore(({ store }) =>
      Effect.gen(function* () {
        yield* store.append(sample(minutesAgo(90), 20, "Band 7"))
        yield* store.append(sample(minutesAgo(30), 10))
        yield* store.append(sample(minutesAgo(20), 15))
        return {
          all: [yield* store.perBandAggregate(), yield* store.perBandAggregate()],
          recent: [yield* store.perBandAggregate("6 hours"), yield* store.perBandAggregate("6 hours")],
        }
      })
    )

    expect(result.all[1]).toEqual(result.all[0])
    expect(result.recent[1]).toEqual(result.recent[0])
    expect(result.all[0].get("Band 3")?.count).toBe(2)
  })

  it("leaves the log untouched when the mirror cannot be replaced", async () => {
    const result = await withStore(({ store, config, fs }) =>
      Effect.gen(function* () {
        // a non-empty directory in place of the mirror makes the rename fail
        yield* fs.remove(config.jsonPath)
        yield* fs.makeDirectory(config.jsonPath)
        yield* fs.writeFileString(`${config.jsonPath}/blocker`, "")

        const error = yield* Effect.flip(store.append(sample(new Date("2024-03-01T10:00:00.000Z"))))
        return {
          error,
          csv: yield* fs.readFileString(config.csvPath),
          tmpLeft: yield* fs.exists(`${config.jsonPath}.tmp`),
          count: yield* store.count(),
        }
      })
    )

    expect(result.error.reason).toBe("io")
    expect(result.csv).toBe(HEADER)
    expect(result.tmpLeft).toBe(false)
    expect(result.count).toBe(0)
  })

  it("exports the band comparison table", async () => {
    const csv = await withStore(({ store, config, fs }) =>
      Effect.gen(function* () {
        yield* store.append(sample(minutesAgo(2), 20))
        yield* store.append(sample(minutesAgo(1), 10))
        const aggregates = yield* store.exportBandComparison()
        expect(aggregates.size).toBe(1)
        return yield* fs.readFileString(config.bandComparisonPath)
      })
    )

    const [header, row] = parseCsv(csv)
    expect(header.slice(0, 6)).toEqual(["band", "count", "rsrp_mean", "rsrp_std", "rsrp_min", "rsrp_max"])
    expect(header[22]).toBe("signal_quality_mode")
    expect(row[0]).toBe("Band 3")
    expect(row[1]).toBe("2")
    expect(row.slice(10, 14)).toEqual(["15", "7.07", "10", "20"])
    expect(row[22]).toBe("excellent")
  })

  it("rotates only when the log is larger than the threshold", async () => {
    const result = await withStore(({ store, config, fs }) =>
      Effect.gen(function* () {
        yield* store.append(sample(new Date("2024-03-01T10:00:00.000Z")))
        const size = yield* store.sizeBytes()
        const notLarger = yield* store.rotate(size)
        const rotated = yield* store.rotate(size - 1)
        return {
          notLarger,
          rotated,
          csv: yield* fs.readFileString(config.csvPath),
          json: yield* fs.readFileString(config.jsonPath),
          backup: yield* fs.readFileString(`${config.csvPath}.backup`),
          jsonBackup: yield* fs.readFileString(`${config.jsonPath}.backup`),
          count: yield* store.count(),
        }
      })
    )

    expect(result.notLarger).toBe(false)
    expect(result.rotated).toBe(true)
    expect(result.csv).toBe(HEADER)
    expect(JSON.parse(result.json)).toEqual([])
    expect(result.backup.trimEnd().split("\n")).toHaveLength(2)
    expect(JSON.parse(result.jsonBackup)).toHaveLength(1)
    expect(result.count).toBe(0)
  })

  it("rotates once over five appends with a three-row threshold", async () => {
    const rotations = await withStore(({ store }) =>
      Effect.gen(function* () {
        const base = Date.parse("2024-03-01T10:00:00.000Z")
        yield* store.append(sample(new Date(base)))
        const rowBytes = (yield* store.sizeBytes()) - HEADER.length
        const threshold = HEADER.length + 3 * rowBytes - 1

        let rotations = (yield* store.rotate(threshold)) ? 1 : 0
        for (let i = 1; i < 5; i++) {
          yield* store.append(sample(new Date(base + i * 30_000)))
          if (yield* store.rotate(threshold)) rotations++
        }
        return rotations
      })
    )
    expect(rotations).toBe(1)
  })

  it("keeps appending after a rotation", async () => {
    const records = await withStore(({ store }) =>
      Effect.gen(function* () {
        yield* store.append(sample(new Date("2024-03-01T10:00:00.000Z")))
        yield* store.rotate(1)
        yield* store.append(sample(new Date("2024-03-01T09:00:00.000Z")))
        return yield* store.records()
      })
    )
    expect(records.map((r) => r.timestamp)).toEqual(["2024-03-01T09:00:00.000Z"])
  })
})
