export {
  CategoryAccumulator,
  mergeProviderResults,
  sumCategorySavings,
  sumCategoryCounts,
} from "./aggregator.js";
export {
  CloudAnalyzer,
  createCloudAnalyzer,
  selectProviders,
  isAnalyzeTarget,
  DEFAULT_PROBE_FACTORIES,
} from "./analyzer.js";
export type { AnalyzeTarget, AnalysisReport, CloudAnalyzerOptions, ProbeFactories } from "./analyzer.js";
export {
  ArtifactValidationError,
  DEFAULT_ARTIFACT_FILE,
  RunArtifactSchema,
  fromArtifact,
  parseArtifact,
  readArtifact,
  serializeArtifact,
  toArtifact,
  validateArtifact,
  writeArtifact,
} from "./artifact.js";
export type { RunArtifact, FindingRecord, CategoryRecord, RecommendationRecord } from "./artifact.js";
