import { PostureAssessor } from './assessor.js';
import { allChecks } from './checks/index.js';
import { compose } from './composer.js';
import { calculateScore } from './score.js';
import { DEFAULT_THRESHOLDS, type ThresholdTable } from './thresholds.js';
import type { FeedbackResult, MetricSet, ReportedIssue } from './types.js';
import { getLogger } from '../observability/logger.js';

export function createAssessor(thresholds: ThresholdTable = DEFAULT_THRESHOLDS): PostureAssessor {
  const assessor = new PostureAssessor(thresholds);
  allChecks.forEach(check => assessor.register(check));
  return assessor;
}

/**
 * Score a frame and build its feedback. Pure: identical inputs give identical
 * results. Phrases and score come from the same threshold table. Errors
 * outside a single metric check propagate to the caller.
 */
export function analyzePosture(
  metrics: MetricSet,
  issues: readonly ReportedIssue[],
  thresholds: ThresholdTable = DEFAULT_THRESHOLDS
): FeedbackResult {
  const { phrases, recommendations } = createAssessor(thresholds).assess(metrics);
  const score = calculateScore(metrics, issues, thresholds);
  const result = compose(score, phrases, recommendations, issues);

  getLogger().info('Posture analyzed', {
    score: result.score,
    assessment: result.assessment,
    recommendations: result.recommendations.length,
    extras: result.benefits !== null,
  });

  return result;
}

export { PostureAssessor, METRIC_ERROR_PHRASE, type MetricCheck, type MetricFinding } from './assessor.js';
export { compose, ASSESSMENTS } from './composer.js';
export { calculateScore, collectDeductions, hasInsufficientData, type Deduction } from './score.js';
export { classifySeverity, DEFAULT_THRESHOLDS, PENALTIES, type PenaltyKind, type ThresholdTable } from './thresholds.js';
export { classifyIssue, classifyIssues } from './issues.js';
export { getDeskSetupTips, MAINTENANCE_TIPS, POSTURE_BENEFITS, DESK_SETUP_TIPS } from './content.js';
export * from './types.js';
