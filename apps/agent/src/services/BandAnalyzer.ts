/**
 * BandAnalyzer - pure aggregation over signal samples.
 *
 * Turns raw samples into comparable per-band views:
 * - BandPerformance (means, stability, peak vs off-peak SINR)
 * - BandAggregate (mean/std/min/max per field plus modal quality)
 * - MetricsSummary over a time window
 *
 * Every function defines its result for empty input instead of failing.
 */

import { QUALITY_CLASSES, bandwidthScore, type QualityClass } from "@bandpilot/shared"
import {
  recordToSample,
  type AverageMetrics,
  type BandAggregate,
  type BandPerformance,
  type FieldStats,
  type MetricRecord,
  type MetricsSummary,
  type SignalSample,
} from "../schema/Signal.js"

// ============================================
// Constants
// ============================================

/** Local hours of day treated as peak usage */
export const PEAK_HOURS: ReadonlySet<number> = new Set([7, 8, 9, 17, 18, 19])

// ============================================
// Statistics
// ============================================

const mean = (values: readonly number[]): number =>
  values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length

const populationStdDev = (values: readonly number[]): number => {
  if (values.length === 0) return 0
  const avg = mean(values)
  return Math.sqrt(mean(values.map((v) => Math.pow(v - avg, 2))))
}

const sampleStdDev = (values: readonly number[]): number | null => {
  if (values.length < 2) return null
  const avg = mean(values)
  const squaredDiffs = values.reduce((acc, v) => acc + Math.pow(v - avg, 2), 0)
  return Math.sqrt(squaredDiffs / (values.length - 1))
}

/** Mean, sample std-dev, min and max; null for an empty list */
export const calculateStatistics = (values: readonly number[]): FieldStats | null => {
  if (values.length === 0) return null
  return {
    mean: mean(values),
    std: sampleStdDev(values),
    min: values.reduce((lo, v) => (v < lo ? v : lo), values[0]),
    max: values.reduce((hi, v) => (v > hi ? v : hi), values[0]),
  }
}

const zeroStats: FieldStats = { mean: 0, std: null, min: 0, max: 0 }

const statsOf = (values: readonly number[]): FieldStats => calculateStatistics(values) ?? zeroStats

// ============================================
// Band performance
// ============================================

export const emptyBandPerformance = (band: string): BandPerformance => ({
  band,
  sampleCount: 0,
  avgRsrp: 0,
  avgRsrq: 0,
  avgSinr: 0,
  avgBandwidthScore: 0,
  stabilityScore: 0,
  peakPerformance: 0,
  offPeakPerformance: 0,
  peakSampleCount: 0,
})

export const isPeakHour = (timestamp: Date): boolean => PEAK_HOURS.has(timestamp.getHours())

/**
 * Analyze the performance of one band over a set of samples
 */
export const analyzeBand = (band: string, samples: readonly SignalSample[]): BandPerformance => {
  if (samples.length === 0) return emptyBandPerformance(band)

  const scores = samples.map((s) => bandwidthScore(s.sinr, s.rsrp))
  const peak = samples.filter((s) => isPeakHour(s.timestamp))
  const offPeak = samples.filter((s) => !isPeakHour(s.timestamp))

  return {
    band,
    sampleCount: samples.length,
    avgRsrp: mean(samples.map((s) => s.rsrp)),
    avgRsrq: mean(samples.map((s) => s.rsrq)),
    avgSinr: mean(samples.map((s) => s.sinr)),
    avgBandwidthScore: mean(scores),
    stabilityScore: 1 - populationStdDev(scores),
    peakPerformance: mean(peak.map((s) => s.sinr)),
    offPeakPerformance: mean(offPeak.map((s) => s.sinr)),
    peakSampleCount: peak.length,
  }
}

// ============================================
// Grouping
// ============================================

/** Group by band, keys in ascending band order */
export const groupByBand = <T extends { readonly band: string }>(
  items: readonly T[]
): ReadonlyMap<string, readonly T[]> => {
  const groups = new Map<string, T[]>()
  for (const item of items) {
    const group = groups.get(item.band)
    if (group) {
      group.push(item)
    } else {
      groups.set(item.band, [item])
    }
  }
  const ordered = Array.from(groups.keys()).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
  return new Map(ordered.map((band) => [band, groups.get(band) ?? []]))
}

/** Most frequent class; ties go to the better class, empty input is "poor" */
export const modalQuality = (qualities: readonly QualityClass[]): QualityClass => {
  const counts = countQualities(qualities)
  let best: QualityClass = "poor"
  let bestCount = 0
  for (const quality of QUALITY_CLASSES) {
    if (counts[quality] > bestCount) {
      best = quality
      bestCount = counts[quality]
    }
  }
  return best
}

const countQualities = (qualities: readonly QualityClass[]): Record<QualityClass, number> => {
  const counts: Record<QualityClass, number> = { excellent: 0, good: 0, fair: 0, poor: 0 }
  for (const quality of qualities) {
    counts[quality] += 1
  }
  return counts
}

export const aggregateBand = (band: string, records: readonly MetricRecord[]): BandAggregate => ({
  band,
  count: records.length,
  rsrp: statsOf(records.map((r) => r.rsrp)),
  rsrq: statsOf(records.map((r) => r.rsrq)),
  sinr: statsOf(records.map((r) => r.sinr)),
  rssi: statsOf(records.map((r) => r.rssi)),
  bandwidthScore: statsOf(records.map((r) => r.bandwidth_score)),
  modalQuality: modalQuality(records.map((r) => r.signal_quality)),
  performance: analyzeBand(band, records.map(recordToSample)),
})

export const aggregateByBand = (
  records: readonly MetricRecord[]
): ReadonlyMap<string, BandAggregate> => {
  const result = new Map<string, BandAggregate>()
  for (const [band, group] of groupByBand(records)) {
    result.set(band, aggregateBand(band, group))
  }
  return result
}

// ============================================
// Window summary
// ============================================

/** Records with timestamp in [now - windowMs, now] */
export const filterWindow = (
  records: readonly MetricRecord[],
  nowMs: number,
  windowMs: number
): readonly MetricRecord[] => {
  const cutoff = nowMs - windowMs
  return records.filter((r) => {
    const at = Date.parse(r.timestamp)
    return at >= cutoff && at <= nowMs
  })
}

const averageMetrics = (records: readonly MetricRecord[]): AverageMetrics => ({
  rsrp: mean(records.map((r) => r.rsrp)),
  rsrq: mean(records.map((r) => r.rsrq)),
  sinr: mean(records.map((r) => r.sinr)),
  rssi: mean(records.map((r) => r.rssi)),
  bandwidthScore: mean(records.map((r) => r.bandwidth_score)),
})

/**
 * Summarize a set of records; null when there is nothing to summarize
 */
export const summarize = (
  records: readonly MetricRecord[],
  windowSeconds: number
): MetricsSummary | null => {
  if (records.length === 0) return null

  let bestBand = ""
  let worstBand = ""
  let bestScore = -Infinity
  let worstScore = Infinity
  for (const [band, group] of groupByBand(records)) {
    const score = mean(group.map((r) => r.bandwidth_score))
    if (score > bestScore) {
      bestScore = score
      bestBand = band
    }
    if (score < worstScore) {
      worstScore = score
      worstBand = band
    }
  }

  return {
    windowSeconds,
    totalRecords: records.length,
    bandsSeen: Array.from(new Set(records.map((r) => r.band))),
    averageMetrics: averageMetrics(records),
    qualityDistribution: countQualities(records.map((r) => r.signal_quality)),
    bestBand,
    worstBand,
    startTime: records[0].timestamp,
    endTime: records[records.length - 1].timestamp,
  }
}
