import { MAINTENANCE_TIPS, POSTURE_BENEFITS } from './content.js';
import { hasIssueKind } from './issues.js';
import type { FeedbackResult, ReportedIssue } from './types.js';

export const ASSESSMENTS = {
  goodAlignment: 'Posture analysis indicates good alignment.',
  visibility: 'Could not analyze clearly due to visibility. Adjust position/lighting.',
  waiting: 'Waiting for clearer pose data.',
  great: 'Posture looks great! Keep it up.',
  visibilitySuffix: ' Visibility may affect accuracy.',
} as const;

const GREAT_SCORE = 85;

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function describeIssues(
  phrases: readonly string[],
  hasVisibility: boolean,
  isWaiting: boolean
): string {
  if (phrases.length === 0) {
    if (!hasVisibility && !isWaiting) return ASSESSMENTS.goodAlignment;
    if (hasVisibility) return ASSESSMENTS.visibility;
    return ASSESSMENTS.waiting;
  }

  // Phrases carry their own full stop, so the join leaves ".." behind.
  let text = unique(phrases).join('. ') + '.';
  if (hasVisibility) text += ASSESSMENTS.visibilitySuffix;
  return text.replaceAll('..', '.').trim();
}

/**
 * Merge the score and the assessor's output into one response.
 *
 * Extras (maintenance tips and benefits) go with a great score or with any
 * posture issue. Visibility or waiting without a posture issue never carries
 * recommendations or extras.
 */
export function compose(
  score: number | null,
  phrases: readonly string[],
  recommendations: readonly string[],
  issues: readonly ReportedIssue[]
): FeedbackResult {
  const hasPostureIssue = phrases.length > 0;
  const hasVisibility = hasIssueKind(issues, 'visibility', 'unclear');
  const isWaiting = hasIssueKind(issues, 'waiting');

  let assessment = describeIssues(phrases, hasVisibility, isWaiting);
  let showExtras = false;

  if (score !== null && score >= GREAT_SCORE && !hasPostureIssue && !hasVisibility) {
    assessment = ASSESSMENTS.great;
    showExtras = true;
  } else if (hasPostureIssue) {
    showExtras = true;
  }

  let finalRecommendations = unique(recommendations.filter(rec => rec.length > 0));

  if ((hasVisibility || isWaiting) && !hasPostureIssue) {
    finalRecommendations = [];
    showExtras = false;
  }

  return {
    score,
    assessment,
    recommendations: finalRecommendations,
    maintenanceTips: showExtras ? [...MAINTENANCE_TIPS] : [],
    benefits: showExtras ? POSTURE_BENEFITS : null,
  };
}
