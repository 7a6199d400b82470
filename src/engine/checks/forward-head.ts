import type { MetricCheck, MetricFinding } from '../assessor.js';
import { classifySeverity, type ThresholdTable } from '../thresholds.js';

export const forwardHeadCheck: MetricCheck = {
  id: 'forward-head',
  metric: 'headForwardRatio',
  description: 'Head position ahead of the shoulders (positive = forward)',

  evaluate(value: number, thresholds: ThresholdTable): MetricFinding | null {
    switch (classifySeverity('headForwardRatio', value, thresholds)) {
      case 'significant':
        return {
          phrase: 'Significant forward head posture.',
          recommendations: [
            'Gently tuck chin (ears over shoulders).',
            "Ensure monitor at eye level & arm's length.",
          ],
        };
      case 'warning':
        return {
          phrase: 'Slight forward head posture.',
          recommendations: ['Perform chin tucks periodically. Check monitor distance.'],
        };
      case 'none':
        return null;
    }
  },
};
