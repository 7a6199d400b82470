import { DEFAULT_THRESHOLDS, type ThresholdTable } from './thresholds.js';
import type { Assessment, MetricName, MetricSet } from './types.js';
import { getLogger } from '../observability/logger.js';

export const METRIC_ERROR_PHRASE = 'Error during metric analysis.';

export interface MetricFinding {
  phrase: string;
  recommendations: string[];
}

export interface MetricCheck {
  id: string;
  metric: MetricName;
  description: string;
  evaluate(value: number, thresholds: ThresholdTable): MetricFinding | null;
}

export class PostureAssessor {
  private checks: MetricCheck[] = [];

  constructor(private thresholds: ThresholdTable = DEFAULT_THRESHOLDS) {}

  register(check: MetricCheck): void {
    this.checks.push(check);
  }

  /**
   * Phrases and recommendations in check registration order. Missing metrics
   * are skipped; a failing check adds the error phrase and the rest still run.
   */
  assess(metrics: MetricSet): Assessment {
    const phrases: string[] = [];
    const recommendations: string[] = [];

    for (const check of this.checks) {
      const value = metrics[check.metric];
      if (value === undefined || value === null) continue;

      try {
        const finding = check.evaluate(value, this.thresholds);
        if (finding) {
          phrases.push(finding.phrase);
          recommendations.push(...finding.recommendations);
        }
      } catch (error) {
        getLogger().error('Metric processing error', {
          check: check.id,
          metric: check.metric,
          error: error instanceof Error ? error.message : String(error),
        });
        phrases.push(METRIC_ERROR_PHRASE);
      }
    }

    return { phrases, recommendations };
  }
}
