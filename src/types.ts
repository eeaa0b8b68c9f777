/**
 * Cloud Economizer: Shared Types
 *
 * Findings, category buckets, run results and recommendations.
 * Wire (snake_case) shapes live in `artifact.ts`.
 */

// =============================================================================
// Findings
// =============================================================================

/** A single detected optimization opportunity on one resource. */
export type Finding = {
  /** Unique within a provider+region scope, not globally. */
  resourceId: string;
  resourceType: string;
  /** Absent for global resources such as storage buckets. */
  region?: string;
  issue: string;
  recommendation: string;
  /** USD/month, from a pricing heuristic. */
  estimatedMonthlySavings: number;
  /** Estimator certainty in [0,1]. Advisory only. */
  confidence: number;
  currentConfig?: string;
  cpuUtilization?: number;
};

// =============================================================================
// Categories
// =============================================================================

/** Accumulated state for one category across provider scans. */
export type CategoryBucket = {
  count: number;
  savings: number;
  items: Finding[];
};

/** Category name → bucket. Keys are provider-defined labels. */
export type CategoryMap = Record<string, CategoryBucket>;

/**
 * One provider's contribution for a category. Every field may be missing
 * when a probe only partially succeeded.
 */
export type CategoryPayload = {
  count?: number;
  savings?: number;
  items?: Finding[];
};

/** Category name → payload, as returned by a provider probe. */
export type ProviderResults = Record<string, CategoryPayload | undefined>;

// =============================================================================
// Recommendations
// =============================================================================

export type Priority = "High" | "Medium" | "Low";
export type RiskLevel = "Medium" | "Low" | "Very Low";
export type Effort = "Low" | "Medium";

/** A ranked, scored record derived from one category bucket. */
export type Recommendation = Readonly<{
  category: string;
  priority: Priority;
  findingCount: number;
  totalSavings: number;
  averageSavingsPerItem: number;
  recommendation: string;
  riskLevel: RiskLevel;
  effort: Effort;
}>;

// =============================================================================
// Run Result
// =============================================================================

/** Aggregate for one analyzer invocation. */
export type RunResult = {
  /** Run start, ISO-8601. */
  timestamp: string;
  categories: CategoryMap;
  recommendations: readonly Recommendation[];
  totalSavings: number;
};

// =============================================================================
// Providers
// =============================================================================

export type CloudProvider = "aws" | "azure" | "gcp";

export const CLOUD_PROVIDERS: readonly CloudProvider[] = ["aws", "azure", "gcp"];
