/**
 * Run artifact: the persisted JSON consumed by report and script generators.
 *
 * Key names and nesting are a stable contract, so the wire shape is kept
 * separate from the in-memory types and validated with TypeBox on read.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import type { CategoryMap, Finding, Recommendation, RunResult } from "../types.js";
import { setOwnEntry } from "./aggregator.js";

// =============================================================================
// Schemas
// =============================================================================

export const FindingRecordSchema = Type.Object({
  resource_id: Type.String(),
  resource_type: Type.String(),
  region: Type.Optional(Type.String()),
  issue: Type.String(),
  recommendation: Type.String(),
  estimated_monthly_savings: Type.Number({ minimum: 0 }),
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  current_config: Type.Optional(Type.String()),
  cpu_utilization: Type.Optional(Type.Number()),
});

export const CategoryRecordSchema = Type.Object({
  count: Type.Integer({ minimum: 0 }),
  savings: Type.Number(),
  items: Type.Array(FindingRecordSchema),
});

export const RecommendationRecordSchema = Type.Object({
  category: Type.String(),
  priority: Type.Union([Type.Literal("High"), Type.Literal("Medium"), Type.Literal("Low")]),
  finding_count: Type.Integer({ minimum: 1 }),
  total_savings: Type.Number(),
  average_savings_per_item: Type.Number(),
  recommendation: Type.String(),
  risk_level: Type.Union([Type.Literal("Medium"), Type.Literal("Low"), Type.Literal("Very Low")]),
  effort: Type.Union([Type.Literal("Low"), Type.Literal("Medium")]),
});

export const RunArtifactSchema = Type.Object({
  timestamp: Type.String(),
  categories: Type.Record(Type.String(), CategoryRecordSchema),
  recommendations: Type.Array(RecommendationRecordSchema),
  total_savings: Type.Number(),
});

export type FindingRecord = Static<typeof FindingRecordSchema>;
export type CategoryRecord = Static<typeof CategoryRecordSchema>;
export type RecommendationRecord = Static<typeof RecommendationRecordSchema>;
export type RunArtifact = Static<typeof RunArtifactSchema>;

export const DEFAULT_ARTIFACT_FILE = "analysis_results.json";

export class ArtifactValidationError extends Error {
  readonly errors: string[];

  constructor(source: string, errors: string[]) {
    super(`Invalid analysis data in ${source}: ${errors.join("; ")}`);
    this.name = "ArtifactValidationError";
    this.errors = errors;
  }
}

// =============================================================================
// Conversion
// =============================================================================

export function toFindingRecord(finding: Finding): FindingRecord {
  const record: FindingRecord = {
    resource_id: finding.resourceId,
    resource_type: finding.resourceType,
    issue: finding.issue,
    recommendation: finding.recommendation,
    estimated_monthly_savings: finding.estimatedMonthlySavings,
    confidence: finding.confidence,
  };
  if (finding.region !== undefined) record.region = finding.region;
  if (finding.currentConfig !== undefined) record.current_config = finding.currentConfig;
  if (finding.cpuUtilization !== undefined) record.cpu_utilization = finding.cpuUtilization;
  return record;
}

export function fromFindingRecord(record: FindingRecord): Finding {
  return {
    resourceId: record.resource_id,
    resourceType: record.resource_type,
    region: record.region,
    issue: record.issue,
    recommendation: record.recommendation,
    estimatedMonthlySavings: record.estimated_monthly_savings,
    confidence: record.confidence,
    currentConfig: record.current_config,
    cpuUtilization: record.cpu_utilization,
  };
}

export function toRecommendationRecord(rec: Recommendation): RecommendationRecord {
  return {
    category: rec.category,
    priority: rec.priority,
    finding_count: rec.findingCount,
    total_savings: rec.totalSavings,
    average_savings_per_item: rec.averageSavingsPerItem,
    recommendation: rec.recommendation,
    risk_level: rec.riskLevel,
    effort: rec.effort,
  };
}

export function fromRecommendationRecord(record: RecommendationRecord): Recommendation {
  return {
    category: record.category,
    priority: record.priority,
    findingCount: record.finding_count,
    totalSavings: record.total_savings,
    averageSavingsPerItem: record.average_savings_per_item,
    recommendation: record.recommendation,
    riskLevel: record.risk_level,
    effort: record.effort,
  };
}

export function toArtifact(run: RunResult): RunArtifact {
  const categories: Record<string, CategoryRecord> = {};
  for (const [name, bucket] of Object.entries(run.categories)) {
    setOwnEntry(categories, name, {
      count: bucket.count,
      savings: bucket.savings,
      items: bucket.items.map(toFindingRecord),
    });
  }

  return {
    timestamp: run.timestamp,
    categories,
    recommendations: run.recommendations.map(toRecommendationRecord),
    total_savings: run.totalSavings,
  };
}

export function fromArtifact(artifact: RunArtifact): RunResult {
  const categories: CategoryMap = {};
  for (const [name, record] of Object.entries(artifact.categories)) {
    setOwnEntry(categories, name, {
      count: record.count,
      savings: record.savings,
      items: record.items.map(fromFindingRecord),
    });
  }

  return {
    timestamp: artifact.timestamp,
    categories,
    recommendations: artifact.recommendations.map(fromRecommendationRecord),
    totalSavings: artifact.total_savings,
  };
}

// =============================================================================
// Validation & I/O
// =============================================================================

export function validateArtifact(value: unknown, source = "(input)"): RunArtifact {
  if (Check(RunArtifactSchema, value)) return value;

  const errors: string[] = [];
  for (const error of Errors(RunArtifactSchema, value)) {
    errors.push(`${error.path || "(root)"}: ${error.message}`);
  }
  throw new ArtifactValidationError(source, errors.length > 0 ? errors : ["does not match schema"]);
}

export function parseArtifact(raw: string, source = "(input)"): RunArtifact {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ArtifactValidationError(source, [`not valid JSON (${message})`]);
  }
  return validateArtifact(parsed, source);
}

export function readArtifact(filePath: string): RunArtifact {
  return parseArtifact(readFileSync(filePath, "utf-8"), filePath);
}

export function serializeArtifact(artifact: RunArtifact): string {
  return JSON.stringify(artifact, null, 2);
}

export function writeArtifact(filePath: string, run: RunResult): RunArtifact {
  const artifact = toArtifact(run);
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, serializeArtifact(artifact));
  return artifact;
}
