/**
 * Recommendation scoring: priority, risk and effort classification.
 */

import { getCategoryProfile } from "../categories/registry.js";
import type { Effort, Priority, RiskLevel } from "../types.js";

export const HIGH_PRIORITY_SAVINGS = 10_000;
export const HIGH_PRIORITY_COUNT = 50;
export const MEDIUM_PRIORITY_SAVINGS = 1_000;
export const MEDIUM_PRIORITY_COUNT = 10;

/**
 * Ordered-OR classification: High is tested first, then Medium. Both
 * thresholds are strict, so a category sitting exactly on them is Low.
 */
export function classifyPriority(savings: number, count: number): Priority {
  if (savings > HIGH_PRIORITY_SAVINGS || count > HIGH_PRIORITY_COUNT) return "High";
  if (savings > MEDIUM_PRIORITY_SAVINGS || count > MEDIUM_PRIORITY_COUNT) return "Medium";
  return "Low";
}

export function classifyRisk(category: string): RiskLevel {
  return getCategoryProfile(category).riskLevel;
}

export function classifyEffort(category: string): Effort {
  return getCategoryProfile(category).effort;
}

export function remedyFor(category: string): string {
  return getCategoryProfile(category).remedy;
}
