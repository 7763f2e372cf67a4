import type { RiskLevel } from '../types/index.js';

// Inclusive lower bounds, checked from the top
const LEVEL_THRESHOLDS: ReadonlyArray<[number, RiskLevel]> = [
  [86, 'critical'],
  [61, 'high'],
  [31, 'medium'],
];

export function levelForScore(score: number): RiskLevel {
  for (const [threshold, level] of LEVEL_THRESHOLDS) {
    if (score >= threshold) return level;
  }
  return 'low';
}

export function clampScore(value: number): number {
  return Math.min(100, Math.max(0, Math.round(value)));
}
