/**
 * Category Registry
 *
 * One entry per known resource category: the remedy text shown to users,
 * the risk of acting on it, and the effort it takes. Unknown categories
 * resolve to the generic entry.
 */

import type { Effort, RiskLevel } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CategoryProfile = {
  remedy: string;
  riskLevel: RiskLevel;
  effort: Effort;
};

// =============================================================================
// Known Categories
// =============================================================================

export const KNOWN_CATEGORIES = {
  "EC2 Instances": {
    remedy: "Review and rightsize or terminate idle instances",
    riskLevel: "Medium",
    effort: "Medium",
  },
  "EBS Volumes": {
    remedy: "Delete unattached volumes or create snapshots",
    riskLevel: "Low",
    effort: "Low",
  },
  "Elastic IPs": {
    remedy: "Release unattached Elastic IPs",
    riskLevel: "Very Low",
    effort: "Low",
  },
  "RDS Databases": {
    remedy: "Downsize or use reserved instances for better pricing",
    riskLevel: "Medium",
    effort: "Medium",
  },
  "S3 Storage": {
    remedy: "Implement lifecycle policies to optimize storage costs",
    riskLevel: "Very Low",
    effort: "Medium",
  },
  "Virtual Machines": {
    remedy: "Deallocate stopped VMs or resize active ones",
    riskLevel: "Medium",
    effort: "Medium",
  },
  "Managed Disks": {
    remedy: "Clean up unattached disks",
    riskLevel: "Low",
    effort: "Low",
  },
  "Storage Accounts": {
    remedy: "Optimize storage tier based on access patterns",
    riskLevel: "Very Low",
    effort: "Medium",
  },
  "Compute Instances": {
    remedy: "Review instance utilization and rightsizing",
    riskLevel: "Medium",
    effort: "Medium",
  },
  "Persistent Disks": {
    remedy: "Remove unattached disks",
    riskLevel: "Low",
    effort: "Low",
  },
  "Cloud Storage": {
    remedy: "Configure lifecycle management for automatic optimization",
    riskLevel: "Very Low",
    effort: "Medium",
  },
} as const satisfies Record<string, CategoryProfile>;

export type KnownCategory = keyof typeof KNOWN_CATEGORIES;

export const GENERIC_CATEGORY_PROFILE: CategoryProfile = {
  remedy: "Review and optimize resources",
  riskLevel: "Very Low",
  effort: "Medium",
};

// =============================================================================
// Lookup
// =============================================================================

/** Narrow an arbitrary provider label to a registered category. */
export function isKnownCategory(name: string): name is KnownCategory {
  return Object.prototype.hasOwnProperty.call(KNOWN_CATEGORIES, name);
}

/** Resolve a category's profile. Never fails. */
export function getCategoryProfile(name: string): CategoryProfile {
  return isKnownCategory(name) ? KNOWN_CATEGORIES[name] : GENERIC_CATEGORY_PROFILE;
}

/**
 * Normalize a provider-supplied category label. Surrounding whitespace is
 * dropped; an empty label becomes "Uncategorized".
 */
export function normalizeCategoryName(raw: string): string {
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : "Uncategorized";
}
