export { AwsProbe, SdkAwsScanClient, createAwsProbe } from "./aws.js";
export type { AwsScanClient, AwsProbeOptions, CpuMetricQuery } from "./aws.js";
export { AzureProbe, SdkAzureScanClient, createAzureProbe } from "./azure.js";
export type {
  AzureScanClient,
  AzureProbeOptions,
  AzureVmRecord,
  AzureDiskRecord,
  AzureStorageAccountRecord,
} from "./azure.js";
export { GcpProbe, RestGcpScanClient, createGcpProbe } from "./gcp.js";
export type { GcpScanClient, GcpProbeOptions, GcpInstance, GcpDisk, GcpBucket } from "./gcp.js";
export { GcpApiError, resolveGcpAccessToken } from "./gcp-api.js";
export { withRetry, shouldRetryError, formatErrorMessage } from "./retry.js";
export type { RetryOptions } from "./retry.js";
export type { ProviderProbe, ProbeReport } from "./types.js";
