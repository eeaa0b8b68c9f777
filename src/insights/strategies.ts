/**
 * Recommendation strategies.
 *
 * The basic strategy is the reference scorer. The enhanced strategy is the
 * plug-in point for deeper analysis and currently reuses the basic scorer.
 */

import type { CategoryMap, Recommendation } from "../types.js";
import { classifyEffort, classifyPriority, classifyRisk, remedyFor } from "./scoring.js";

export type RecommendationMode = "basic" | "enhanced";

export interface RecommendationStrategy {
  readonly mode: RecommendationMode;
  generate(categories: CategoryMap): Recommendation[];
}

// =============================================================================
// Basic
// =============================================================================

export class BasicRecommendationStrategy implements RecommendationStrategy {
  readonly mode = "basic";

  generate(categories: CategoryMap): Recommendation[] {
    const recommendations: Recommendation[] = [];

    for (const [category, bucket] of Object.entries(categories)) {
      if (bucket.count <= 0) continue;

      recommendations.push({
        category,
        priority: classifyPriority(bucket.savings, bucket.count),
        findingCount: bucket.count,
        totalSavings: bucket.savings,
        averageSavingsPerItem: bucket.savings / bucket.count,
        recommendation: remedyFor(category),
        riskLevel: classifyRisk(category),
        effort: classifyEffort(category),
      });
    }

    return rankBySavings(recommendations);
  }
}

/**
 * Sort by total savings, highest first. Array#sort is stable, so equal
 * savings keep category-map insertion order.
 */
export function rankBySavings(recommendations: Recommendation[]): Recommendation[] {
  return [...recommendations].sort((a, b) => b.totalSavings - a.totalSavings);
}

// =============================================================================
// Enhanced
// =============================================================================

export type EnhancedStrategyOptions = {
  model: string;
  apiKey: string;
  /** Scorer used until a model-backed one is wired in. */
  base?: RecommendationStrategy;
};

/**
 * Scores with the base strategy. `model` is kept so a model-backed scorer can
 * replace the base one without changing how the engine constructs this class.
 */
export class EnhancedRecommendationStrategy implements RecommendationStrategy {
  readonly mode = "enhanced";
  readonly model: string;
  private readonly apiKey: string;
  private readonly base: RecommendationStrategy;

  constructor(options: EnhancedStrategyOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.base = options.base ?? new BasicRecommendationStrategy();
  }

  generate(categories: CategoryMap): Recommendation[] {
    if (this.apiKey.length === 0) {
      throw new Error(`No API key available for model ${this.model}`);
    }
    return this.base.generate(categories);
  }
}
