import type { MetricName, Severity } from './types.js';

export interface SeverityCutoffs {
  readonly warning: number;
  readonly significant: number;
}

export type ThresholdTable = Readonly<Record<MetricName, SeverityCutoffs>>;

export const DEFAULT_THRESHOLDS: ThresholdTable = {
  shoulderAngle: { warning: 5.0, significant: 10.0 },
  torsoAngleFromVertical: { warning: 15.0, significant: 20.0 },
  spineHorizontalOffsetRatio: { warning: 0.15, significant: 0.2 },
  headForwardRatio: { warning: 0.1, significant: 0.15 },
};

export type PenaltyKind = 'significant' | 'warning' | 'missing_data_low' | 'visibility_issue';

export const PENALTIES: Readonly<Record<PenaltyKind, number>> = {
  significant: 22,
  warning: 14,
  missing_data_low: 5,
  visibility_issue: 6,
};

// Angles deviate in both directions; the ratios only count when positive.
const SIGNED_METRICS: ReadonlySet<MetricName> = new Set<MetricName>([
  'shoulderAngle',
  'torsoAngleFromVertical',
]);

export function classifySeverity(
  metric: MetricName,
  value: number,
  thresholds: ThresholdTable = DEFAULT_THRESHOLDS
): Severity {
  if (!Number.isFinite(value)) return 'none';

  const magnitude = SIGNED_METRICS.has(metric) ? Math.abs(value) : value;
  const cutoffs = thresholds[metric];

  if (magnitude > cutoffs.significant) return 'significant';
  if (magnitude > cutoffs.warning) return 'warning';
  return 'none';
}
