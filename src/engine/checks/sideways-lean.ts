import type { MetricCheck, MetricFinding } from '../assessor.js';
import { classifySeverity, type ThresholdTable } from '../thresholds.js';

export const sidewaysLeanCheck: MetricCheck = {
  id: 'sideways-lean',
  metric: 'spineHorizontalOffsetRatio',
  description: 'Horizontal spine offset relative to the hips',

  evaluate(value: number, thresholds: ThresholdTable): MetricFinding | null {
    switch (classifySeverity('spineHorizontalOffsetRatio', value, thresholds)) {
      case 'significant':
        return {
          phrase: 'Significant sideways lean.',
          recommendations: ['Engage core, sit centered.', 'Avoid leaning heavily on one armrest.'],
        };
      case 'warning':
        return {
          phrase: 'Slight sideways lean.',
          recommendations: ['Check if leaning towards monitor or on armrest.'],
        };
      case 'none':
        return null;
    }
  },
};
