export { shouldersCheck } from './shoulders.js';
export { sidewaysLeanCheck } from './sideways-lean.js';
export { slouchCheck } from './slouch.js';
export { forwardHeadCheck } from './forward-head.js';

import { shouldersCheck } from './shoulders.js';
import { sidewaysLeanCheck } from './sideways-lean.js';
import { slouchCheck } from './slouch.js';
import { forwardHeadCheck } from './forward-head.js';

// Order decides the order of phrases in the assessment.
export const allChecks = [
  shouldersCheck,
  sidewaysLeanCheck,
  slouchCheck,
  forwardHeadCheck,
];
