/**
 * Effect Schema definitions and domain types for signal samples.
 *
 * The persisted log mirrors MetricRecord field for field: the CSV header and
 * the JSON mirror both use these snake_case keys.
 */

import { Schema } from "effect"
import { QUALITY_CLASSES, type QualityClass } from "@bandpilot/shared"

// ============================================
// Enums
// ============================================

export const QualityClassSchema = Schema.Literal(...QUALITY_CLASSES)

export type { QualityClass }

// ============================================
// Signal Sample (router observation)
// ============================================

export interface SignalSample {
  readonly timestamp: Date
  readonly band: string
  readonly rsrp: number
  readonly rsrq: number
  readonly sinr: number
  readonly rssi: number
  readonly cellId: string
  readonly plmn: string
}

// ============================================
// Metric Record (persisted row)
// ============================================

export const METRIC_COLUMNS = [
  "timestamp",
  "band",
  "rsrp",
  "rsrq",
  "sinr",
  "rssi",
  "cell_id",
  "plmn",
  "signal_quality",
  "bandwidth_score",
] as const

export type MetricColumn = (typeof METRIC_COLUMNS)[number]

export const MetricRecord = Schema.Struct({
  timestamp: Schema.String,
  band: Schema.String,
  rsrp: Schema.Number,
  rsrq: Schema.Number,
  sinr: Schema.Number,
  rssi: Schema.Number,
  cell_id: Schema.String,
  plmn: Schema.String,
  signal_quality: QualityClassSchema,
  bandwidth_score: Schema.Number,
})

export type MetricRecord = typeof MetricRecord.Type

/**
 * CSV cells arrive as strings; numeric columns are decoded from them.
 */
export const MetricCsvRow = Schema.Struct({
  timestamp: Schema.String,
  band: Schema.String,
  rsrp: Schema.NumberFromString,
  rsrq: Schema.NumberFromString,
  sinr: Schema.NumberFromString,
  rssi: Schema.NumberFromString,
  cell_id: Schema.String,
  plmn: Schema.String,
  signal_quality: QualityClassSchema,
  bandwidth_score: Schema.NumberFromString,
})

// ============================================
// Derived views
// ============================================

/** Per-band performance used to compare bands against each other */
export interface BandPerformance {
  readonly band: string
  readonly sampleCount: number
  readonly avgRsrp: number
  readonly avgRsrq: number
  readonly avgSinr: number
  readonly avgBandwidthScore: number
  /** 1 - population std-dev of bandwidth scores; negative when std-dev > 1 */
  readonly stabilityScore: number
  /** Mean SINR of samples taken in peak hours; 0 without any */
  readonly peakPerformance: number
  readonly offPeakPerformance: number
  readonly peakSampleCount: number
}

export interface FieldStats {
  readonly mean: number
  /** Sample std-dev; null below two samples */
  readonly std: number | null
  readonly min: number
  readonly max: number
}

export interface BandAggregate {
  readonly band: string
  readonly count: number
  readonly rsrp: FieldStats
  readonly rsrq: FieldStats
  readonly sinr: FieldStats
  readonly rssi: FieldStats
  readonly bandwidthScore: FieldStats
  readonly modalQuality: QualityClass
  readonly performance: BandPerformance
}

export interface AverageMetrics {
  readonly rsrp: number
  readonly rsrq: number
  readonly sinr: number
  readonly rssi: number
  readonly bandwidthScore: number
}

export interface MetricsSummary {
  readonly windowSeconds: number
  readonly totalRecords: number
  readonly bandsSeen: readonly string[]
  readonly averageMetrics: AverageMetrics
  readonly qualityDistribution: Readonly<Record<QualityClass, number>>
  readonly bestBand: string
  readonly worstBand: string
  readonly startTime: string
  readonly endTime: string
}

// ============================================
// Conversions
// ============================================

export const recordToSample = (record: MetricRecord): SignalSample => ({
  timestamp: new Date(record.timestamp),
  band: record.band,
  rsrp: record.rsrp,
  rsrq: record.rsrq,
  sinr: record.sinr,
  rssi: record.rssi,
  cellId: record.cell_id,
  plmn: record.plmn,
})
