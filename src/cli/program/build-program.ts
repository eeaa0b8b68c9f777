import { Command } from "commander";

import { VERSION } from "../../version.js";
import { defaultRuntime, type CliRuntime } from "../cli-utils.js";
import { registerAnalyzeCommand, type AnalyzeCommandDeps } from "./register.analyze.js";
import { registerGenerateCommand } from "./register.generate.js";
import { registerReportCommand } from "./register.report.js";

export type BuildProgramOptions = AnalyzeCommandDeps & {
  runtime?: CliRuntime;
};

export function buildProgram(options: BuildProgramOptions = {}): Command {
  const runtime = options.runtime ?? defaultRuntime;
  const program = new Command();

  program
    .name("cloud-economizer")
    .description("Find idle and orphaned cloud resources and rank the savings")
    .version(VERSION);

  registerAnalyzeCommand(program, runtime, { probes: options.probes, logger: options.logger });
  registerReportCommand(program, runtime);
  registerGenerateCommand(program, runtime);

  return program;
}
