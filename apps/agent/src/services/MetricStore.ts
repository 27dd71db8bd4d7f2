/**
 * MetricStore - append-only signal log.
 *
 * Persists every sample twice: a CSV log (the tabular form consumed by charting
 * and report tools) and a JSON array mirror. Both always hold the same rows.
 *
 * Writes (append, rotate) take a single permit; reads are served from an
 * in-memory snapshot that only the writer replaces, so they never wait on I/O.
 */
import { FileSystem, Path } from "@effect/platform"
import type { PlatformError } from "@effect/platform/Error"
import { Clock, Context, Duration, Effect, Either, Layer, Ref, Schema } from "effect"
import { bandwidthScore, classifySample } from "@bandpilot/shared"
import { StoreConfigService, type StoreConfig } from "../config/AgentConfig.js"
import {
  METRIC_COLUMNS,
  MetricCsvRow,
  type BandAggregate,
  type FieldStats,
  type MetricRecord,
  type MetricsSummary,
  type SignalSample,
} from "../schema/Signal.js"
import { aggregateByBand, filterWindow, summarize } from "./BandAnalyzer.js"

// ============================================
// Error Types
// ============================================

export class PersistenceFailure {
  readonly _tag = "PersistenceFailure"
  constructor(
    readonly operation: string,
    readonly reason: "io" | "out_of_order" | "invalid_sample",
    readonly message: string,
    readonly cause?: unknown
  ) {}
}

// ============================================
// MetricStore Interface
// ============================================

export interface MetricStore {
  readonly csvPath: string
  readonly jsonPath: string

  /**
   * Append one sample to both representations
   */
  readonly append: (sample: SignalSample) => Effect.Effect<MetricRecord, PersistenceFailure>

  /**
   * Append samples in order, stopping at the first failure
   */
  readonly appendBatch: (
    samples: readonly SignalSample[]
  ) => Effect.Effect<number, PersistenceFailure>

  /**
   * Summary of samples within [now - window, now]; null when none match
   */
  readonly summary: (window: Duration.DurationInput) => Effect.Effect<MetricsSummary | null>

  readonly records: (window?: Duration.DurationInput) => Effect.Effect<readonly MetricRecord[]>

  /**
   * Per-band statistics over the whole log, or over a trailing window
   */
  readonly perBandAggregate: (
    window?: Duration.DurationInput
  ) => Effect.Effect<ReadonlyMap<string, BandAggregate>>

  /**
   * Write the per-band comparison table as CSV and return it
   */
  readonly exportBandComparison: (
    outputPath?: string
  ) => Effect.Effect<ReadonlyMap<string, BandAggregate>, PersistenceFailure>

  /**
   * Move the log to its backup path and start empty when it exceeds maxSizeBytes
   */
  readonly rotate: (maxSizeBytes: number) => Effect.Effect<boolean, PersistenceFailure>

  readonly count: () => Effect.Effect<number>

  readonly sizeBytes: () => Effect.Effect<number, PersistenceFailure>
}

export class MetricStoreTag extends Context.Tag("MetricStore")<MetricStoreTag, MetricStore>() {}

// ============================================
// CSV helpers
// ============================================

const CSV_HEADER = `${METRIC_COLUMNS.join(",")}\n`

const NO_RECORDS: readonly MetricRecord[] = []

const escapeCsvCell = (value: string | number): string => {
  const text = String(value)
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text
}

export const encodeCsvRow = (cells: readonly (string | number)[]): string =>
  `${cells.map(escapeCsvCell).join(",")}\n`

const recordToCsvRow = (record: MetricRecord): string =>
  encodeCsvRow(METRIC_COLUMNS.map((column) => record[column]))

/**
 * Split CSV text into rows of cells. Quoted cells may contain commas,
 * doubled quotes and line breaks.
 */
export const parseCsv = (text: string): string[][] => {
  const rows: string[][] = []
  let row: string[] = []
  let cell = ""
  let quoted = false

  for (let i = 0; i < text.length; i++) {
    const char = text[i]
    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          cell += '"'
          i++
        } else {
          quoted = false
        }
      } else {
        cell += char
      }
      continue
    }
    if (char === '"') {
      quoted = true
    } else if (char === ",") {
      row.push(cell)
      cell = ""
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++
      row.push(cell)
      rows.push(row)
      row = []
      cell = ""
    } else {
      cell += char
    }
  }
  if (cell.length > 0 || row.length > 0) {
    row.push(cell)
    rows.push(row)
  }
  return rows
}

/**
 * Decode CSV text into records, dropping rows that fail validation
 */
export const decodeCsvLog = (
  text: string
): { readonly records: readonly MetricRecord[]; readonly skipped: number } => {
  const [header, ...rows] = parseCsv(text)
  if (header === undefined) return { records: [], skipped: 0 }

  const records: MetricRecord[] = []
  let skipped = 0
  for (const cells of rows) {
    if (cells.length === 1 && cells[0] === "") continue
    const raw = Object.fromEntries(header.map((column, i) => [column, cells[i]]))
    const decoded = Schema.decodeUnknownEither(MetricCsvRow)(raw)
    if (Either.isRight(decoded) && !Number.isNaN(Date.parse(decoded.right.timestamp))) {
      records.push(decoded.right)
    } else {
      skipped++
    }
  }
  return { records, skipped }
}

const round2 = (value: number): number => Math.round(value * 100) / 100

const statsCells = (stats: FieldStats): (string | number)[] => [
  round2(stats.mean),
  stats.std === null ? "" : round2(stats.std),
  round2(stats.min),
  round2(stats.max),
]

const BAND_COMPARISON_HEADER = [
  "band",
  "count",
  ...["rsrp", "rsrq", "sinr", "rssi", "bandwidth_score"].flatMap((field) =>
    ["mean", "std", "min", "max"].map((stat) => `${field}_${stat}`)
  ),
  "signal_quality_mode",
  "stability_score",
  "peak_sinr_mean",
  "off_peak_sinr_mean",
]

export const encodeBandComparison = (aggregates: ReadonlyMap<string, BandAggregate>): string => {
  const lines = [encodeCsvRow(BAND_COMPARISON_HEADER)]
  for (const aggregate of aggregates.values()) {
    lines.push(
      encodeCsvRow([
        aggregate.band,
        aggregate.count,
        ...statsCells(aggregate.rsrp),
        ...statsCells(aggregate.rsrq),
        ...statsCells(aggregate.sinr),
        ...statsCells(aggregate.rssi),
        ...statsCells(aggregate.bandwidthScore),
        aggregate.modalQuality,
        round2(aggregate.performance.stabilityScore),
        round2(aggregate.performance.peakPerformance),
        round2(aggregate.performance.offPeakPerformance),
      ])
    )
  }
  return lines.join("")
}

// ============================================
// Record conversion
// ============================================

const sampleToRecord = (sample: SignalSample): MetricRecord => ({
  timestamp: sample.timestamp.toISOString(),
  band: sample.band,
  rsrp: sample.rsrp,
  rsrq: sample.rsrq,
  sinr: sample.sinr,
  rssi: sample.rssi,
  cell_id: sample.cellId,
  plmn: sample.plmn,
  signal_quality: classifySample(sample),
  bandwidth_score: bandwidthScore(sample.sinr, sample.rsrp),
})

const isValidSample = (sample: SignalSample): boolean =>
  !Number.isNaN(sample.timestamp.getTime()) &&
  [sample.rsrp, sample.rsrq, sample.sinr, sample.rssi].every(Number.isFinite)

// ============================================
// Implementation
// ============================================

export const makeMetricStore = (
  config: StoreConfig
): Effect.Effect<MetricStore, PersistenceFailure, FileSystem.FileSystem | Path.Path> =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem
    const path = yield* Path.Path

    const csvPath = path.resolve(config.csvPath)
    const jsonPath = path.resolve(config.jsonPath)
    const jsonTmpPath = `${jsonPath}.tmp`

    const io =
      (operation: string) =>
      <A>(effect: Effect.Effect<A, PlatformError>): Effect.Effect<A, PersistenceFailure> =>
        effect.pipe(
          Effect.mapError(
            (error) => new PersistenceFailure(operation, "io", `${operation} failed: ${error.message}`, error)
          )
        )

    const encodeJson = (records: readonly MetricRecord[]): string =>
      `${JSON.stringify(records, null, 2)}\n`

    /**
     * Load the snapshot from the CSV log. Unreadable data degrades to an
     * empty snapshot.
     */
    const loadSnapshot = Effect.gen(function* () {
      const exists = yield* fs.exists(csvPath)
      if (!exists) return NO_RECORDS

      const text = yield* fs.readFileString(csvPath)
      const { records, skipped } = decodeCsvLog(text)
      if (skipped > 0) {
        yield* Effect.logWarning(`Skipped ${skipped} malformed rows in ${csvPath}`)
      }
      return records
    }).pipe(
      Effect.catchAll((error) =>
        Effect.gen(function* () {
          yield* Effect.logWarning(`Could not read ${csvPath}, starting empty: ${error.message}`)
          return NO_RECORDS
        })
      )
    )

    const initialize = Effect.gen(function* () {
      for (const file of [csvPath, jsonPath]) {
        yield* fs.makeDirectory(path.dirname(file), { recursive: true })
      }
      const snapshot = yield* loadSnapshot
      if (!(yield* fs.exists(csvPath))) {
        yield* fs.writeFileString(csvPath, CSV_HEADER)
      }
      yield* fs.writeFileString(jsonPath, encodeJson(snapshot))
      return snapshot
    })

    const initial = yield* io("initialize")(initialize)
    yield* Effect.logInfo(`Metric store ready: ${initial.length} records in ${csvPath}`)

    const snapshotRef = yield* Ref.make<readonly MetricRecord[]>(initial)
    const writeLock = yield* Effect.makeSemaphore(1)

    const appendUnlocked = (sample: SignalSample) =>
      Effect.gen(function* () {
        if (!isValidSample(sample)) {
          return yield* Effect.fail(
            new PersistenceFailure("append", "invalid_sample", "Sample has non-numeric readings")
          )
        }

        const current = yield* Ref.get(snapshotRef)
        const last = current.at(-1)
        if (last !== undefined && Date.parse(last.timestamp) > sample.timestamp.getTime()) {
          return yield* Effect.fail(
            new PersistenceFailure(
              "append",
              "out_of_order",
              `Sample at ${sample.timestamp.toISOString()} precedes last record at ${last.timestamp}`
            )
          )
        }

        const record = sampleToRecord(sample)
        const next = [...current, record]

        const { size: csvSize } = yield* io("append")(fs.stat(csvPath))
        yield* io("append")(fs.writeFileString(jsonTmpPath, encodeJson(next)))
        yield* io("append")(fs.writeFileString(csvPath, recordToCsvRow(record), { flag: "a" })).pipe(
          Effect.tapError(() => fs.remove(jsonTmpPath).pipe(Effect.ignore))
        )
        // the log must not keep a row the mirror and snapshot never got
        yield* io("append")(fs.rename(jsonTmpPath, jsonPath)).pipe(
          Effect.tapError(() =>
            Effect.zipRight(
              fs.remove(jsonTmpPath).pipe(Effect.ignore),
              fs.truncate(csvPath, csvSize).pipe(
                Effect.catchAll((error) =>
                  Effect.logError(`Could not roll back ${csvPath}, it now differs from ${jsonPath}: ${error.message}`)
                )
              )
            )
          )
        )
        yield* Ref.set(snapshotRef, next)
        return record
      })

    const windowed = (window?: Duration.DurationInput) =>
      Effect.gen(function* () {
        const records = yield* Ref.get(snapshotRef)
        if (window === undefined) return records
        const now = yield* Clock.currentTimeMillis
        return filterWindow(records, now, Duration.toMillis(Duration.decode(window)))
      })

    const perBandAggregate = (window?: Duration.DurationInput) =>
      Effect.map(windowed(window), aggregateByBand)

    const store: MetricStore = {
      csvPath,
      jsonPath,

      append: (sample) =>
        appendUnlocked(sample).pipe(
          writeLock.withPermits(1),
          Effect.tapError((error) => Effect.logError(`Failed to persist sample: ${error.message}`))
        ),

      appendBatch: (samples) =>
        Effect.gen(function* () {
          for (const sample of samples) {
            yield* appendUnlocked(sample)
          }
          return samples.length
        }).pipe(writeLock.withPermits(1)),

      summary: (window) =>
        Effect.gen(function* () {
          const records = yield* windowed(window)
          return summarize(records, Duration.toSeconds(Duration.decode(window)))
        }),

      records: windowed,

      perBandAggregate,

      exportBandComparison: (outputPath = config.bandComparisonPath) =>
        Effect.gen(function* () {
          const aggregates = yield* perBandAggregate()
          const target = path.resolve(outputPath)
          yield* io("exportBandComparison")(fs.writeFileString(target, encodeBandComparison(aggregates)))
          yield* Effect.logInfo(`Band comparison exported to ${target}`)
          return aggregates
        }),

      rotate: (maxSizeBytes) =>
        Effect.gen(function* () {
          const size = yield* io("rotate")(fs.stat(csvPath)).pipe(Effect.map((info) => Number(info.size)))
          if (size <= maxSizeBytes) return false

          yield* io("rotate")(
            Effect.gen(function* () {
              yield* fs.rename(csvPath, `${csvPath}.backup`)
              if (yield* fs.exists(jsonPath)) {
                yield* fs.rename(jsonPath, `${jsonPath}.backup`)
              }
              yield* fs.writeFileString(csvPath, CSV_HEADER)
              yield* fs.writeFileString(jsonPath, encodeJson([]))
            })
          )
          yield* Ref.set(snapshotRef, [])
          yield* Effect.logInfo(`Rotated ${csvPath} (${size} bytes) to ${csvPath}.backup`)
          return true
        }).pipe(writeLock.withPermits(1)),

      count: () => Effect.map(Ref.get(snapshotRef), (records) => records.length),

      sizeBytes: () =>
        io("sizeBytes")(fs.stat(csvPath)).pipe(Effect.map((info) => Number(info.size))),
    }

    return store
  })

// ============================================
// Layer
// ============================================

export const MetricStoreLive = Layer.effect(
  MetricStoreTag,
  Effect.gen(function* () {
    const config = yield* StoreConfigService
    return yield* makeMetricStore(config)
  })
)
