import type { Command } from "commander";

import {
  createCloudAnalyzer,
  isAnalyzeTarget,
  type AnalysisReport,
  type ProbeFactories,
} from "../../analysis/analyzer.js";
import { applyOverrides, DEFAULT_CONFIG_PATH, loadConfig } from "../../config/io.js";
import { createLogger, type Logger } from "../../logging/logger.js";
import { formatUsd } from "../../reports/generator.js";
import { CliError, runCommandWithRuntime, table, type CliRuntime } from "../cli-utils.js";

export type AnalyzeCommandOptions = {
  provider: string;
  config: string;
  profile?: string;
  subscriptionId?: string;
  projectId?: string;
};

export type AnalyzeCommandDeps = {
  probes?: Partial<ProbeFactories>;
  logger?: Logger;
};

export function formatAnalysisSummary(report: AnalysisReport): string[] {
  const rows = Object.entries(report.run.categories)
    .filter(([, bucket]) => bucket.count > 0)
    .map(([name, bucket]) => [name, String(bucket.count), formatUsd(bucket.savings)]);
  const findings = Object.values(report.run.categories).reduce((sum, b) => sum + b.count, 0);
  rows.push(["TOTAL", String(findings), formatUsd(report.run.totalSavings)]);

  const { outcome } = report;
  const mode =
    outcome.status === "ok" ? outcome.mode : `${outcome.mode} (degraded: ${outcome.reason})`;

  const lines = ["Analysis Summary", table(["Category", "Findings", "Est. Monthly Savings"], rows, [1, 2])];
  lines.push(`Recommendation mode: ${mode}`);
  if (report.warnings.length > 0) {
    lines.push(`Warnings (${report.warnings.length}):`);
    lines.push(...report.warnings.map((w) => `  - ${w}`));
  }
  return lines;
}

export async function analyzeCommand(
  opts: AnalyzeCommandOptions,
  runtime: CliRuntime,
  deps: AnalyzeCommandDeps = {},
): Promise<AnalysisReport> {
  const target = opts.provider;
  if (!isAnalyzeTarget(target)) {
    throw new CliError(`Unknown provider "${target}"; expected aws, azure, gcp or all`);
  }

  const loaded = loadConfig(opts.config);
  const config = applyOverrides(loaded.config, {
    awsProfile: opts.profile,
    azureSubscriptionId: opts.subscriptionId,
    gcpProjectId: opts.projectId,
  });

  const logger = deps.logger ?? createLogger("analyzer", config.logging);
  if (loaded.path) {
    logger.debug(`Loaded configuration from ${loaded.path}`);
  } else {
    logger.warn(`No configuration found at ${opts.config}; using defaults`);
  }

  const analyzer = createCloudAnalyzer({ config, logger, probes: deps.probes });
  const report = await analyzer.analyze(target);

  for (const line of formatAnalysisSummary(report)) runtime.log(line);
  if (report.artifactPath) {
    runtime.log(`Results saved to ${report.artifactPath}`);
    runtime.log("Run 'cloud-economizer report' to generate detailed reports");
  }
  return report;
}

export function registerAnalyzeCommand(program: Command, runtime: CliRuntime, deps: AnalyzeCommandDeps = {}) {
  program
    .command("analyze")
    .description("Scan cloud providers for idle or orphaned resources")
    .option("--provider <provider>", "aws, azure, gcp or all", "all")
    .option("--config <path>", "Configuration file", DEFAULT_CONFIG_PATH)
    .option("--profile <name>", "AWS profile")
    .option("--subscription-id <id>", "Azure subscription ID")
    .option("--project-id <id>", "GCP project ID")
    .action(async (opts: AnalyzeCommandOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        await analyzeCommand(opts, runtime, deps);
      });
    });
}
