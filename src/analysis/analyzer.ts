/**
 * Cloud Analyzer
 *
 * Orchestrates one run: selects providers, runs their probes, merges the
 * results in provider order, generates recommendations and persists the
 * run artifact.
 */

import { join } from "node:path";
import type { AwsConfig, EconomizerConfig } from "../config/schema.js";
import { createInsightEngine, type InsightEngine, type RecommendationOutcome } from "../insights/engine.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { createAwsProbe } from "../providers/aws.js";
import { createAzureProbe } from "../providers/azure.js";
import { createGcpProbe } from "../providers/gcp.js";
import { formatErrorMessage } from "../providers/retry.js";
import type { ProbeReport, ProviderProbe } from "../providers/types.js";
import { CLOUD_PROVIDERS, type CloudProvider, type RunResult } from "../types.js";
import { CategoryAccumulator } from "./aggregator.js";
import { DEFAULT_ARTIFACT_FILE, writeArtifact } from "./artifact.js";

// =============================================================================
// Types
// =============================================================================

export type AnalyzeTarget = CloudProvider | "all";

export type ProbeFactories = {
  aws: (config: AwsConfig, logger: Logger) => ProviderProbe;
  azure: (subscriptionId: string, logger: Logger) => ProviderProbe;
  gcp: (projectId: string, logger: Logger) => ProviderProbe;
};

export const DEFAULT_PROBE_FACTORIES: ProbeFactories = {
  aws: (config, logger) => createAwsProbe({ config, logger }),
  azure: (subscriptionId, logger) => createAzureProbe({ subscriptionId, logger }),
  gcp: (projectId, logger) => createGcpProbe({ projectId, logger }),
};

export type CloudAnalyzerOptions = {
  config: EconomizerConfig;
  logger?: Logger;
  probes?: Partial<ProbeFactories>;
  insightEngine?: InsightEngine;
  now?: () => Date;
  /** Write `<outputDir>/analysis_results.json` after each run. Default true. */
  persist?: boolean;
};

export type AnalysisReport = {
  run: RunResult;
  outcome: RecommendationOutcome;
  /** Providers whose probe contributed results. */
  providers: CloudProvider[];
  warnings: string[];
  artifactPath: string | null;
};

// =============================================================================
// Provider Selection
// =============================================================================

export function isAnalyzeTarget(value: string): value is AnalyzeTarget {
  return value === "all" || CLOUD_PROVIDERS.some((p) => p === value);
}

/** "all" respects each provider's enabled flag; a named provider always runs. */
export function selectProviders(target: AnalyzeTarget, config: EconomizerConfig): CloudProvider[] {
  if (target !== "all") return [target];
  return CLOUD_PROVIDERS.filter((provider) => config[provider].enabled);
}

// =============================================================================
// CloudAnalyzer
// =============================================================================

type PendingScan = { provider: CloudProvider; scan: () => Promise<ProbeReport> };

export class CloudAnalyzer {
  readonly timestamp: string;
  private config: EconomizerConfig;
  private logger: Logger;
  private factories: ProbeFactories;
  private engine: InsightEngine;
  private persist: boolean;
  private accumulator = new CategoryAccumulator();
  private recommendations: RecommendationOutcome["recommendations"] = [];

  constructor(options: CloudAnalyzerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger("analyzer", options.config.logging);
    this.factories = { ...DEFAULT_PROBE_FACTORIES, ...options.probes };
    this.engine =
      options.insightEngine ??
      createInsightEngine({
        enabled: options.config.ai.enabled,
        model: options.config.ai.model,
        logger: this.logger.child("insights"),
      });
    this.persist = options.persist ?? true;
    this.timestamp = (options.now ?? (() => new Date()))().toISOString();
  }

  get totalSavings(): number {
    return this.accumulator.totalSavings;
  }

  /** Current run state; recommendations reflect the latest `analyze()` call. */
  getResult(): RunResult {
    return {
      timestamp: this.timestamp,
      categories: this.accumulator.snapshot(),
      recommendations: this.recommendations,
      totalSavings: this.accumulator.totalSavings,
    };
  }

  async analyze(target: AnalyzeTarget = "all"): Promise<AnalysisReport> {
    const providers = selectProviders(target, this.config);
    const warnings: string[] = [];
    const scans: PendingScan[] = [];

    for (const provider of providers) {
      const probe = this.createProbe(provider, warnings);
      if (probe) scans.push({ provider, scan: () => probe.scan() });
    }

    this.logger.info(`Analyzing ${scans.map((s) => s.provider).join(", ") || "no providers"}`);

    const contributed = this.config.analysis.parallelProviders
      ? await this.scanParallel(scans, warnings)
      : await this.scanSequential(scans, warnings);

    const outcome = this.engine.enhance(this.accumulator.getCategories());
    this.recommendations = outcome.recommendations;
    if (outcome.status === "degraded") warnings.push(outcome.message);

    const run = this.getResult();
    let artifactPath: string | null = null;
    if (this.persist) {
      artifactPath = join(this.config.analysis.outputDir, DEFAULT_ARTIFACT_FILE);
      writeArtifact(artifactPath, run);
      this.logger.info(`Results saved to ${artifactPath}`);
    }

    return { run, outcome, providers: contributed, warnings, artifactPath };
  }

  private createProbe(provider: CloudProvider, warnings: string[]): ProviderProbe | null {
    const logger = this.logger.child(provider);
    try {
      switch (provider) {
        case "aws":
          return this.factories.aws(this.config.aws, logger);
        case "azure": {
          const subscriptionId = this.config.azure.subscriptionId;
          if (!subscriptionId) {
            this.warn(warnings, "Azure subscription ID not provided; skipping Azure analysis");
            return null;
          }
          return this.factories.azure(subscriptionId, logger);
        }
        case "gcp": {
          const projectId = this.config.gcp.projectId;
          if (!projectId) {
            this.warn(warnings, "GCP project ID not provided; skipping GCP analysis");
            return null;
          }
          return this.factories.gcp(projectId, logger);
        }
      }
    } catch (error) {
      this.warn(warnings, `Could not initialize ${provider} probe: ${formatErrorMessage(error)}`);
      return null;
    }
  }

  private warn(warnings: string[], message: string): void {
    warnings.push(message);
    this.logger.warn(message);
  }

  private mergeReport(provider: CloudProvider, report: ProbeReport, warnings: string[]): void {
    warnings.push(...report.warnings);
    const savings = this.accumulator.merge(report.results);
    this.logger.debug(`Merged ${provider} results ($${savings.toFixed(2)}/month)`);
  }

  private async scanSequential(scans: PendingScan[], warnings: string[]): Promise<CloudProvider[]> {
    const contributed: CloudProvider[] = [];
    for (const { provider, scan } of scans) {
      try {
        this.mergeReport(provider, await scan(), warnings);
        contributed.push(provider);
      } catch (error) {
        this.warn(warnings, `${provider} analysis failed: ${formatErrorMessage(error)}`);
      }
    }
    return contributed;
  }

  /** Scans run concurrently; merges happen afterwards in provider order. */
  private async scanParallel(scans: PendingScan[], warnings: string[]): Promise<CloudProvider[]> {
    const settled = await Promise.allSettled(scans.map((s) => s.scan()));
    const contributed: CloudProvider[] = [];
    settled.forEach((result, index) => {
      const scan = scans[index];
      if (!scan) return;
      if (result.status === "fulfilled") {
        this.mergeReport(scan.provider, result.value, warnings);
        contributed.push(scan.provider);
      } else {
        this.warn(warnings, `${scan.provider} analysis failed: ${formatErrorMessage(result.reason)}`);
      }
    });
    return contributed;
  }
}

export function createCloudAnalyzer(options: CloudAnalyzerOptions): CloudAnalyzer {
  return new CloudAnalyzer(options);
}
