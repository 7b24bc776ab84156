/**
 * Per-axis copy: display labels, quest titles and the empathetic context
 * handed to the oracle. Every table is a Record over HealthAxis, so adding an
 * axis without its copy fails to compile.
 */

import { HealthAxis } from '../types/diagnosis';

export const AXIS_LABELS: Record<HealthAxis, string> = {
  asset_stability: 'Asset Stability',
  time_independence: 'Time Independence',
  physical_condition: 'Physical Condition',
  emotional_balance: 'Emotional Balance',
  network_power: 'Network Power',
  system_leverage: 'System Leverage'
};

export const QUEST_TITLES: Record<HealthAxis, string> = {
  asset_stability: 'Asset Stability Check-up',
  time_independence: 'Time Independence Check-up',
  physical_condition: 'Physical Condition Check-up',
  emotional_balance: 'Emotional Balance Check-up',
  network_power: 'Network Power Check-up',
  system_leverage: 'System Leverage Check-up'
};

export const EMPATHY_CONTEXTS: Record<HealthAxis, string> = {
  asset_stability:
    'is feeling uneasy. Some nights, just before sleep, the thought "what if my income stopped tomorrow?" slips in.',
  time_independence:
    'is being chased by the clock. "When will I ever have some slack?" Every day just feels busy.',
  physical_condition:
    'is physically worn out. "Is it fine to keep running like this?" There is a worry that the body\'s signals are being missed.',
  emotional_balance:
    'is emotionally shaken. "Am I the only one struggling?" That thought is tiring at times.',
  network_power:
    'has let relationships slide. "Is there anyone on my side?" Sometimes it feels lonely.',
  system_leverage:
    'keeps repeating the same work. "How long will I do this by hand?" There must be a better way, but it is hard to see.'
};

export function axisLabel(axis: HealthAxis): string {
  return AXIS_LABELS[axis];
}

export function questTitle(axis: HealthAxis): string {
  return QUEST_TITLES[axis];
}

export function empathyContext(axis: HealthAxis): string {
  return EMPATHY_CONTEXTS[axis];
}
