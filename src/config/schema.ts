/**
 * Configuration schema.
 *
 * Every field has a default, so an empty object (or a missing file) is a
 * valid configuration.
 */

import { Type, type Static } from "@sinclair/typebox";

export const AwsConfigSchema = Type.Object(
  {
    enabled: Type.Boolean({ default: true }),
    regions: Type.Array(Type.String({ minLength: 1 }), { minItems: 1, default: ["us-east-1"] }),
    profile: Type.Optional(Type.String({ description: "Named profile from the shared AWS config" })),
    lookbackDays: Type.Integer({ minimum: 1, default: 30, description: "CloudWatch metric window" }),
  },
  { default: {} },
);

export const AzureConfigSchema = Type.Object(
  {
    enabled: Type.Boolean({ default: false }),
    subscriptionId: Type.Optional(Type.String()),
  },
  { default: {} },
);

export const GcpConfigSchema = Type.Object(
  {
    enabled: Type.Boolean({ default: false }),
    projectId: Type.Optional(Type.String()),
  },
  { default: {} },
);

export const AnalysisConfigSchema = Type.Object(
  {
    parallelProviders: Type.Boolean({
      default: false,
      description: "Scan providers concurrently; results still merge in provider order",
    }),
    outputDir: Type.String({ default: "output" }),
  },
  { default: {} },
);

export const AiConfigSchema = Type.Object(
  {
    enabled: Type.Boolean({ default: false }),
    model: Type.String({ default: "gpt-4" }),
  },
  { default: {} },
);

export const LoggingConfigSchema = Type.Object(
  {
    level: Type.Union(
      [
        Type.Literal("trace"),
        Type.Literal("debug"),
        Type.Literal("info"),
        Type.Literal("warn"),
        Type.Literal("error"),
        Type.Literal("fatal"),
      ],
      { default: "info" },
    ),
    file: Type.Optional(Type.String()),
  },
  { default: {} },
);

export const EconomizerConfigSchema = Type.Object({
  aws: AwsConfigSchema,
  azure: AzureConfigSchema,
  gcp: GcpConfigSchema,
  analysis: AnalysisConfigSchema,
  ai: AiConfigSchema,
  logging: LoggingConfigSchema,
});

export type AwsConfig = Static<typeof AwsConfigSchema>;
export type AzureConfig = Static<typeof AzureConfigSchema>;
export type GcpConfig = Static<typeof GcpConfigSchema>;
export type AnalysisConfig = Static<typeof AnalysisConfigSchema>;
export type AiConfig = Static<typeof AiConfigSchema>;
export type LoggingConfig = Static<typeof LoggingConfigSchema>;
export type EconomizerConfig = Static<typeof EconomizerConfigSchema>;
