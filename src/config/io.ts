/**
 * Configuration loading.
 *
 * Reads a JSON file, fills defaults from the schema and validates the
 * result. A missing file yields the defaults.
 */

import { existsSync, readFileSync } from "node:fs";
import { Check, Value } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { EconomizerConfigSchema, type EconomizerConfig } from "./schema.js";

export const DEFAULT_CONFIG_PATH = "config/config.json";

export class ConfigValidationError extends Error {
  readonly errors: string[];

  constructor(source: string, errors: string[]) {
    super(`Invalid configuration in ${source}: ${errors.join("; ")}`);
    this.name = "ConfigValidationError";
    this.errors = errors;
  }
}

export type LoadedConfig = {
  config: EconomizerConfig;
  /** Path the configuration came from, or null when defaults were used. */
  path: string | null;
};

/** Fill defaults on a raw value and validate it. */
export function resolveConfig(raw: unknown, source = "(input)"): EconomizerConfig {
  const candidate = Value.Default(EconomizerConfigSchema, structuredClone(raw ?? {}));
  if (Check(EconomizerConfigSchema, candidate)) return candidate;

  const errors: string[] = [];
  for (const error of Errors(EconomizerConfigSchema, candidate)) {
    errors.push(`${error.path || "(root)"}: ${error.message}`);
  }
  throw new ConfigValidationError(source, errors.length > 0 ? errors : ["does not match schema"]);
}

export function defaultConfig(): EconomizerConfig {
  return resolveConfig({}, "(defaults)");
}

export function loadConfig(filePath: string = DEFAULT_CONFIG_PATH): LoadedConfig {
  if (!existsSync(filePath)) {
    return { config: defaultConfig(), path: null };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError(filePath, [`not valid JSON (${message})`]);
  }

  return { config: resolveConfig(raw, filePath), path: filePath };
}

export type ConfigOverrides = {
  awsProfile?: string;
  azureSubscriptionId?: string;
  gcpProjectId?: string;
};

/** Apply command-line overrides without mutating the input. */
export function applyOverrides(config: EconomizerConfig, overrides: ConfigOverrides): EconomizerConfig {
  return {
    ...config,
    aws: { ...config.aws, profile: overrides.awsProfile ?? config.aws.profile },
    azure: { ...config.azure, subscriptionId: overrides.azureSubscriptionId ?? config.azure.subscriptionId },
    gcp: { ...config.gcp, projectId: overrides.gcpProjectId ?? config.gcp.projectId },
  };
}
