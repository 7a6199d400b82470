import type { FeedbackResult } from '../engine/types.js';

export interface FeedbackBody {
  score: number | null;
  assessment: string;
  recommendations: string[];
  maintenance_tips: string[];
  benefits: string | null;
}

export interface DeskSetupBody {
  tips: string[];
}

export function toFeedbackBody(result: FeedbackResult): FeedbackBody {
  return {
    score: result.score,
    assessment: result.assessment,
    recommendations: result.recommendations,
    maintenance_tips: result.maintenanceTips,
    benefits: result.benefits,
  };
}
