export const MAINTENANCE_TIPS: readonly string[] = [
  'Take brief breaks every 30 mins to stretch/move.',
  'Ensure feet flat, knees ~90°, back supported.',
  'Keep elbows near 90° while typing, close to body.',
  "Monitor top roughly at eye level, arm's length away.",
  "Use lumbar support for spine's natural curve.",
];

export const POSTURE_BENEFITS =
  'Good posture reduces pain (back, neck, shoulders), improves breathing & focus, and prevents long-term spinal issues.';

export const DESK_SETUP_TIPS: readonly string[] = [
  "**Monitor:** Top edge at/below eye level, arm's length away.",
  '**Chair:** Feet flat (use footrest if needed), knees ~level with hips, proper back support.',
  '**Keyboard/Mouse:** Close to body, elbows ~90°, straight wrists.',
  '**Desk Height:** Adjust chair first, then desk for parallel forearms.',
  '**Lighting:** Avoid screen glare; use task lighting if needed.',
  '**Breaks:** Stand, stretch, walk around every 30-60 mins.',
  '**Accessories:** Consider document holder, headset for calls.',
];

export function getDeskSetupTips(): string[] {
  return [...DESK_SETUP_TIPS];
}
