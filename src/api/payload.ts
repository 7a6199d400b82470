import { isRecord, type ValidationError } from '../config/schema.js';
import { classifyIssues } from '../engine/issues.js';
import { METRIC_NAMES, type MetricSet, type ReportedIssue } from '../engine/types.js';

export interface AnalyzeRequest {
  metrics: MetricSet;
  issues: ReportedIssue[];
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: ValidationError[] };

/**
 * Recognized metric keys are kept; anything that is not a finite number is
 * kept as null so the key still counts towards a non-empty set.
 */
export function parseMetrics(raw: Record<string, unknown>): MetricSet {
  const metrics: MetricSet = {};
  for (const name of METRIC_NAMES) {
    if (!(name in raw)) continue;
    const value = raw[name];
    metrics[name] = typeof value === 'number' && Number.isFinite(value) ? value : null;
  }
  return metrics;
}

export function parseAnalyzeRequest(body: unknown): ParseResult<AnalyzeRequest> {
  if (!isRecord(body)) {
    return { ok: false, errors: [{ path: 'body', message: 'Must be a JSON object' }] };
  }

  const errors: ValidationError[] = [];
  let metrics: MetricSet = {};
  const issueTexts: string[] = [];

  const rawMetrics = body['metrics'];
  if (rawMetrics !== undefined && rawMetrics !== null) {
    if (isRecord(rawMetrics)) {
      metrics = parseMetrics(rawMetrics);
    } else {
      errors.push({ path: 'metrics', message: 'Must be an object' });
    }
  }

  const rawIssues = body['issues'];
  if (rawIssues !== undefined && rawIssues !== null) {
    if (Array.isArray(rawIssues)) {
      rawIssues.forEach((issue: unknown, index) => {
        if (typeof issue === 'string') {
          issueTexts.push(issue);
        } else {
          errors.push({ path: `issues.${index}`, message: 'Must be a string' });
        }
      });
    } else {
      errors.push({ path: 'issues', message: 'Must be an array of strings' });
    }
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return { ok: true, value: { metrics, issues: classifyIssues(issueTexts) } };
}

export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors.map(e => `${e.path}: ${e.message}`).join(', ');
}
