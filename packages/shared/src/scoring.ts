// Signal scoring shared by the agent and anything reading its logs.

export const QUALITY_CLASSES = ["excellent", "good", "fair", "poor"] as const;

export type QualityClass = (typeof QUALITY_CLASSES)[number];

export interface RadioMetrics {
  rsrp: number;
  rsrq: number;
  sinr: number;
}

const clamp01 = (value: number): number => Math.max(0, Math.min(1, value));

const clamp0 = (value: number): number => Math.max(0, value);

/**
 * Throughput proxy in [0, 1]. SINR carries 70% of the weight, RSRP the rest.
 * Both terms saturate outside -10..20 dB SINR and -140..-80 dBm RSRP.
 */
export function bandwidthScore(sinr: number, rsrp: number): number {
  const sinrScore = clamp01((sinr + 10) / 30);
  const rsrpScore = clamp01((rsrp + 140) / 60);
  return sinrScore * 0.7 + rsrpScore * 0.3;
}

/**
 * Weighted signal quality. Only the lower bound is clamped, so very strong
 * signals score above 1.
 */
export function qualityScore(rsrp: number, rsrq: number, sinr: number): number {
  const rsrpScore = clamp0((rsrp + 140) / 60);
  const rsrqScore = clamp0((rsrq + 25) / 15);
  const sinrScore = clamp0((sinr + 10) / 30);
  return rsrpScore * 0.4 + rsrqScore * 0.3 + sinrScore * 0.3;
}

export function classify(score: number): QualityClass {
  if (score >= 0.8) return "excellent";
  if (score >= 0.6) return "good";
  if (score >= 0.4) return "fair";
  return "poor";
}

export function classifySample(metrics: RadioMetrics): QualityClass {
  return classify(qualityScore(metrics.rsrp, metrics.rsrq, metrics.sinr));
}

/** Lower rank is better; used to order histograms and break ties. */
export function qualityRank(quality: QualityClass): number {
  return QUALITY_CLASSES.indexOf(quality);
}
