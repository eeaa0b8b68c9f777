export { InsightEngine, createInsightEngine, AI_API_KEY_ENV } from "./engine.js";
export type { RecommendationOutcome, DegradationReason, InsightEngineOptions } from "./engine.js";
export {
  BasicRecommendationStrategy,
  EnhancedRecommendationStrategy,
  rankBySavings,
} from "./strategies.js";
export type { RecommendationMode, RecommendationStrategy, EnhancedStrategyOptions } from "./strategies.js";
export {
  classifyPriority,
  classifyRisk,
  classifyEffort,
  remedyFor,
  HIGH_PRIORITY_SAVINGS,
  HIGH_PRIORITY_COUNT,
  MEDIUM_PRIORITY_SAVINGS,
  MEDIUM_PRIORITY_COUNT,
} from "./scoring.js";
