import type { MetricCheck, MetricFinding } from '../assessor.js';
import { classifySeverity, type ThresholdTable } from '../thresholds.js';

// Forward slouch and backward lean both show up as torso deviation from vertical.
export const slouchCheck: MetricCheck = {
  id: 'slouch',
  metric: 'torsoAngleFromVertical',
  description: 'Torso deviation from vertical',

  evaluate(value: number, thresholds: ThresholdTable): MetricFinding | null {
    switch (classifySeverity('torsoAngleFromVertical', value, thresholds)) {
      case 'significant':
        return {
          phrase: 'Significant slouch or backward lean.',
          recommendations: [
            'Sit tall, chest up.',
            'Use lumbar support actively.',
            'Stretch chest/back during breaks.',
          ],
        };
      case 'warning':
        return {
          phrase: 'Slight slouch or backward lean.',
          recommendations: ['Gently pull shoulder blades back/down. Imagine head pulled up.'],
        };
      case 'none':
        return null;
    }
  },
};
