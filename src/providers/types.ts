/**
 * Provider probe contract.
 */

import type { CategoryPayload, CloudProvider, Finding, ProviderResults } from "../types.js";

export type ProbeReport = {
  results: ProviderResults;
  /** Sections that could not be scanned (region, resource type). */
  warnings: string[];
};

export interface ProviderProbe {
  readonly id: CloudProvider;
  scan(): Promise<ProbeReport>;
}

/** Build a category payload whose count and savings match its items. */
export function toCategoryPayload(items: Finding[]): Required<CategoryPayload> {
  return {
    count: items.length,
    savings: items.reduce((sum, item) => sum + item.estimatedMonthlySavings, 0),
    items,
  };
}

export function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
