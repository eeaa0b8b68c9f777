import type { Command } from "commander";

import { generateScripts, isScriptType } from "../../scripts/generator.js";
import { CliError, runCommandWithRuntime, type CliRuntime } from "../cli-utils.js";
import { DEFAULT_DATA_PATH, loadArtifactOrFail } from "./register.report.js";

export type GenerateCommandOptions = {
  type: string;
  output: string;
  data: string;
};

export async function generateCommand(opts: GenerateCommandOptions, runtime: CliRuntime): Promise<string[]> {
  if (!isScriptType(opts.type)) {
    throw new CliError(`Unknown script type "${opts.type}"; expected terraform, shell or all`);
  }
  const artifact = loadArtifactOrFail(opts.data);
  const files = generateScripts(artifact, opts.type, opts.output);

  runtime.log(`Generated ${files.length} file(s):`);
  for (const file of files) runtime.log(`  ${file}`);
  runtime.log("Review every script before running it; destructive commands are commented out.");
  return files;
}

export function registerGenerateCommand(program: Command, runtime: CliRuntime) {
  program
    .command("generate")
    .description("Generate advisory Terraform and shell scripts from saved analysis results")
    .option("--type <type>", "terraform, shell or all", "all")
    .option("--output <dir>", "Output directory", "scripts")
    .option("--data <path>", "Analysis results file", DEFAULT_DATA_PATH)
    .action(async (opts: GenerateCommandOptions) => {
      await runCommandWithRuntime(runtime, async () => {
        await generateCommand(opts, runtime);
      });
    });
}
