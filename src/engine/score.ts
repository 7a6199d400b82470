import { classifySeverity, DEFAULT_THRESHOLDS, PENALTIES, type PenaltyKind, type ThresholdTable } from './thresholds.js';
import { everyIssueHasKind, hasIssueKind } from './issues.js';
import { METRIC_NAMES, type MetricName, type MetricSet, type ReportedIssue } from './types.js';
import { getLogger } from '../observability/logger.js';

export interface Deduction {
  kind: PenaltyKind;
  metric?: MetricName;
  points: number;
}

export function isEmptyMetricSet(metrics: MetricSet): boolean {
  return Object.keys(metrics).length === 0;
}

/**
 * No metric keys and every issue explains why (visibility or waiting).
 * An empty issue list satisfies this too.
 */
export function hasInsufficientData(metrics: MetricSet, issues: readonly ReportedIssue[]): boolean {
  return isEmptyMetricSet(metrics) && everyIssueHasKind(issues, 'visibility', 'waiting');
}

/**
 * Itemised penalties for a frame. A missing metric only costs points when no
 * visibility issue was reported; the visibility penalty applies once.
 */
export function collectDeductions(
  metrics: MetricSet,
  issues: readonly ReportedIssue[],
  thresholds: ThresholdTable = DEFAULT_THRESHOLDS
): Deduction[] {
  const deductions: Deduction[] = [];
  const hasVisibilityIssue = hasIssueKind(issues, 'visibility');

  for (const metric of METRIC_NAMES) {
    const value = metrics[metric];

    if (value === undefined || value === null) {
      if (!hasVisibilityIssue) {
        deductions.push({ kind: 'missing_data_low', metric, points: PENALTIES.missing_data_low });
      }
      continue;
    }

    const severity = classifySeverity(metric, value, thresholds);
    if (severity !== 'none') {
      deductions.push({ kind: severity, metric, points: PENALTIES[severity] });
    }
  }

  if (hasVisibilityIssue) {
    deductions.push({ kind: 'visibility_issue', points: PENALTIES.visibility_issue });
  }

  return deductions;
}

/**
 * Posture score in [0, 100], or null when there is nothing to score.
 * Score = 100 - sum(deduction.points), rounded and clamped.
 */
export function calculateScore(
  metrics: MetricSet,
  issues: readonly ReportedIssue[],
  thresholds: ThresholdTable = DEFAULT_THRESHOLDS
): number | null {
  if (hasInsufficientData(metrics, issues)) {
    getLogger().debug('Cannot calculate score: insufficient data', { issues: issues.length });
    return null;
  }

  const deductions = collectDeductions(metrics, issues, thresholds);
  const total = deductions.reduce((sum, d) => sum + d.points, 0);
  const score = Math.max(0, Math.min(100, Math.round(100 - total)));

  getLogger().debug('Calculated score', { score, deductions: deductions.length });
  return score;
}
