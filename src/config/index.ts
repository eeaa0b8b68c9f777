export {
  DEFAULT_CONFIG_PATH,
  ConfigValidationError,
  resolveConfig,
  defaultConfig,
  loadConfig,
  applyOverrides,
} from "./io.js";
export type { LoadedConfig, ConfigOverrides } from "./io.js";
export { EconomizerConfigSchema } from "./schema.js";
export type {
  EconomizerConfig,
  AwsConfig,
  AzureConfig,
  GcpConfig,
  AnalysisConfig,
  AiConfig,
  LoggingConfig,
} from "./schema.js";
