import type { MetricCheck, MetricFinding } from '../assessor.js';
import { classifySeverity, type ThresholdTable } from '../thresholds.js';

export const shouldersCheck: MetricCheck = {
  id: 'shoulders',
  metric: 'shoulderAngle',
  description: 'Shoulder line tilt in either direction',

  evaluate(value: number, thresholds: ThresholdTable): MetricFinding | null {
    switch (classifySeverity('shoulderAngle', value, thresholds)) {
      case 'significant':
        return {
          phrase: 'Shoulders significantly uneven.',
          recommendations: ['Sit evenly, relax shoulders.', 'Check armrest height/usage.'],
        };
      case 'warning':
        return {
          phrase: 'Shoulders slightly uneven.',
          recommendations: ['Be mindful of keeping shoulders level.'],
        };
      case 'none':
        return null;
    }
  },
};
