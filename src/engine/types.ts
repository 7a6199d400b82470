export type MetricName =
  | 'shoulderAngle'
  | 'torsoAngleFromVertical'
  | 'spineHorizontalOffsetRatio'
  | 'headForwardRatio';

export const METRIC_NAMES: readonly MetricName[] = [
  'shoulderAngle',
  'torsoAngleFromVertical',
  'spineHorizontalOffsetRatio',
  'headForwardRatio',
];

/**
 * Metric readings for one frame. A missing key and a null value both mean
 * "not measurable"; only a set with no keys at all counts as empty.
 */
export type MetricSet = Partial<Record<MetricName, number | null>>;

export type Severity = 'none' | 'warning' | 'significant';

export type IssueKind = 'visibility' | 'unclear' | 'waiting';

export interface ReportedIssue {
  text: string;
  kinds: readonly IssueKind[];
}

export interface Assessment {
  phrases: string[];
  recommendations: string[];
}

export interface FeedbackResult {
  score: number | null;
  assessment: string;
  recommendations: string[];
  maintenanceTips: string[];
  benefits: string | null;
}
