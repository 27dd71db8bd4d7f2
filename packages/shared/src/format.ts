import { classifySample, type RadioMetrics } from "./scoring.js";

export interface StatusLineInput extends RadioMetrics {
  band: string;
}

export function formatSampleStatus(sample: StatusLineInput): string {
  return [
    `Band: ${sample.band}`,
    `RSRP: ${sample.rsrp.toFixed(1)} dBm`,
    `SINR: ${sample.sinr.toFixed(1)} dB`,
    `Quality: ${classifySample(sample)}`,
  ].join(" | ");
}
