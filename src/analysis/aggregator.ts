/**
 * Aggregation Engine
 *
 * Merges per-provider category results into one global category map.
 * Merge is total: missing, negative or non-numeric fields count as
 * zero/empty, and a count must be a whole number.
 */

import { normalizeCategoryName } from "../categories/registry.js";
import type { CategoryBucket, CategoryMap, CategoryPayload, Finding, ProviderResults } from "../types.js";

// =============================================================================
// Payload Coercion
// =============================================================================

function countOrZero(value: unknown): number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0 ? value : 0;
}

function savingsOrZero(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0 ? value : 0;
}

function itemsOrEmpty(value: unknown): Finding[] {
  return Array.isArray(value) ? value : [];
}

/** Own-property lookup; inherited names such as "constructor" are not entries. */
export function getOwnEntry<T>(map: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/** Store `value` as an own enumerable property, including under "__proto__". */
export function setOwnEntry<T>(map: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(map, key, { value, writable: true, enumerable: true, configurable: true });
}

function emptyBucket(): CategoryBucket {
  return { count: 0, savings: 0, items: [] };
}

// =============================================================================
// Merge
// =============================================================================

/**
 * Merge one provider's results into `current`, in place.
 *
 * @returns the summed savings contributed by this call.
 */
export function mergeProviderResults(current: CategoryMap, providerResults: ProviderResults): number {
  let contributed = 0;

  for (const [rawName, payload] of Object.entries(providerResults)) {
    const name = normalizeCategoryName(rawName);
    const data: CategoryPayload = payload ?? {};
    const savings = savingsOrZero(data.savings);

    let bucket = getOwnEntry(current, name);
    if (!bucket) {
      bucket = emptyBucket();
      setOwnEntry(current, name, bucket);
    }

    bucket.count += countOrZero(data.count);
    bucket.savings += savings;
    for (const item of itemsOrEmpty(data.items)) bucket.items.push(item);
    contributed += savings;
  }

  return contributed;
}

/** Sum of every bucket's savings. */
export function sumCategorySavings(categories: CategoryMap): number {
  let total = 0;
  for (const bucket of Object.values(categories)) total += bucket.savings;
  return total;
}

/** Sum of every bucket's finding count. */
export function sumCategoryCounts(categories: CategoryMap): number {
  let total = 0;
  for (const bucket of Object.values(categories)) total += bucket.count;
  return total;
}

// =============================================================================
// Accumulator
// =============================================================================

/**
 * Holds the category map and the running savings total for one run.
 *
 * The running total is incremented per merge and never recomputed;
 * `recomputeTotalSavings()` derives it from the buckets instead. The two
 * agree up to floating point summation order.
 */
export class CategoryAccumulator {
  private readonly categories: CategoryMap = {};
  private runningTotal = 0;
  private mergeCount = 0;

  merge(providerResults: ProviderResults): number {
    const contributed = mergeProviderResults(this.categories, providerResults);
    this.runningTotal += contributed;
    this.mergeCount++;
    return contributed;
  }

  get totalSavings(): number {
    return this.runningTotal;
  }

  get merges(): number {
    return this.mergeCount;
  }

  recomputeTotalSavings(): number {
    return sumCategorySavings(this.categories);
  }

  getCategories(): CategoryMap {
    return this.categories;
  }

  /** Deep copy of the category map, detached from further merges. */
  snapshot(): CategoryMap {
    const copy: CategoryMap = {};
    for (const [name, bucket] of Object.entries(this.categories)) {
      setOwnEntry(copy, name, { count: bucket.count, savings: bucket.savings, items: bucket.items.slice() });
    }
    return copy;
  }
}
