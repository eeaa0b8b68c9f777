import { existsSync } from "node:fs";
import type { Command } from "commander";

import { DEFAULT_ARTIFACT_FILE, readArtifact, type RunArtifact } from "../../analysis/artifact.js";
import { generateReport, isReportFormat } from "../../reports/generator.js";
import { CliError, runCommandWithRuntime, type CliRuntime } from "../cli-utils.js";

export const DEFAULT_DATA_PATH = `output/${DEFAULT_ARTIFACT_FILE}`;

/** Read a run artifact, failing with a user-facing message when it is absent. */
export function loadArtifactOrFail(dataPath: string): RunArtifact {
  if (!existsSync(dataPath)) {
    throw new CliError(`Analysis data not found at ${dataPath}. Run 'cloud-economizer analyze' first.`);
  }
  return readArtifact(dataPath);
}

export type ReportCommandOptions = {
  format: string;
  output: string;
  data: string;
};

export async function reportCommand(opts: ReportCommandOptions, runtime: CliRuntime): Promise<string> {
  if (!isReportFormat(opts.format)) {
    throw new CliError(`Unknown report format "${opts.format}"; expected html, json or csv`);
  }
  const artifact = loadArtifactOrFail(opts.data);
  const path = generateReport(artifact, opts.format, opts.output);
  runtime.log(`Report saved to ${path}`);
  return path;
}

export function registerReportCommand(program: Command, runtime: CliRuntime) {
  program
    .command("report")
    .description("Render a report from saved analysis results")
    .option("--format <format>", "html, json or csv", "html")
    .option("--output <path>", "Output file", "report.html")
    .option("--data <path>", "Analysis results file", DEFAULT_DATA_PATH)
    .action(async (opts: ReportCommandOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        await reportCommand(opts, runtime);
      });
    });
}
