/**
 * Insight Engine: turns a category map into ranked recommendations.
 *
 * Enhanced mode is chosen once at construction. It needs `OPENAI_API_KEY`;
 * without it the engine downgrades to basic mode. Any error raised by the
 * enhanced strategy falls back to the basic strategy for that call, so
 * `enhance()` always returns a usable list.
 */

import { createLogger, type Logger } from "../logging/logger.js";
import type { CategoryMap, Recommendation } from "../types.js";
import {
  BasicRecommendationStrategy,
  EnhancedRecommendationStrategy,
  type EnhancedStrategyOptions,
  type RecommendationMode,
  type RecommendationStrategy,
} from "./strategies.js";

// =============================================================================
// Types
// =============================================================================

export const AI_API_KEY_ENV = "OPENAI_API_KEY";

export type DegradationReason = "missing-credential" | "enhanced-failed";

export type RecommendationOutcome =
  | {
      status: "ok";
      mode: RecommendationMode;
      recommendations: Recommendation[];
    }
  | {
      status: "degraded";
      mode: "basic";
      reason: DegradationReason;
      message: string;
      recommendations: Recommendation[];
    };

export type InsightEngineOptions = {
  /** Request enhanced mode. */
  enabled?: boolean;
  model?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  createEnhancedStrategy?: (options: EnhancedStrategyOptions) => RecommendationStrategy;
};

// =============================================================================
// Engine
// =============================================================================

export class InsightEngine {
  readonly model: string;
  readonly requestedMode: RecommendationMode;
  private readonly basic: RecommendationStrategy;
  private readonly enhanced: RecommendationStrategy | null;
  private readonly downgradeMessage: string | null;
  private readonly logger: Logger;

  constructor(options: InsightEngineOptions = {}) {
    this.model = options.model ?? "gpt-4";
    this.requestedMode = options.enabled ? "enhanced" : "basic";
    this.logger = options.logger ?? createLogger("insights");
    this.basic = new BasicRecommendationStrategy();

    const env = options.env ?? process.env;
    const apiKey = env[AI_API_KEY_ENV];

    if (this.requestedMode === "enhanced" && !apiKey) {
      this.enhanced = null;
      this.downgradeMessage = `AI features enabled but ${AI_API_KEY_ENV} not set`;
      this.logger.warn(`${this.downgradeMessage}; using basic recommendations`);
    } else if (this.requestedMode === "enhanced" && apiKey) {
      const factory = options.createEnhancedStrategy ?? ((opts: EnhancedStrategyOptions) => new EnhancedRecommendationStrategy(opts));
      this.enhanced = factory({ model: this.model, apiKey, base: this.basic });
      this.downgradeMessage = null;
    } else {
      this.enhanced = null;
      this.downgradeMessage = null;
    }
  }

  /** The mode `enhance()` will attempt first. */
  get activeMode(): RecommendationMode {
    return this.enhanced ? "enhanced" : "basic";
  }

  enhance(categories: CategoryMap): RecommendationOutcome {
    if (!this.enhanced) {
      const recommendations = this.basic.generate(categories);
      if (this.downgradeMessage) {
        return {
          status: "degraded",
          mode: "basic",
          reason: "missing-credential",
          message: this.downgradeMessage,
          recommendations,
        };
      }
      return { status: "ok", mode: "basic", recommendations };
    }

    try {
      return { status: "ok", mode: "enhanced", recommendations: this.enhanced.generate(categories) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`AI enhancement failed, using basic recommendations: ${message}`);
      return {
        status: "degraded",
        mode: "basic",
        reason: "enhanced-failed",
        message,
        recommendations: this.basic.generate(categories),
      };
    }
  }
}

export function createInsightEngine(options?: InsightEngineOptions): InsightEngine {
  return new InsightEngine(options);
}
