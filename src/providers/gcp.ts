/**
 * GCP probe: terminated instances, persistent disks with no users and
 * Cloud Storage buckets without lifecycle rules.
 */

import { Type, type Static } from "@sinclair/typebox";
import { createLogger, type Logger } from "../logging/logger.js";
import type { Finding } from "../types.js";
import { gcpAggregatedList, gcpList, resolveGcpAccessToken, shortName } from "./gcp-api.js";
import { GCS_LIFECYCLE_MONTHLY_SAVINGS, estimateGcpDiskSavings, estimateGcpInstanceSavings } from "./pricing.js";
import { formatErrorMessage, withRetry, type RetryOptions } from "./retry.js";
import { toCategoryPayload, type ProbeReport, type ProviderProbe } from "./types.js";

const COMPUTE_API = "https://compute.googleapis.com/compute/v1";
const STORAGE_API = "https://storage.googleapis.com/storage/v1";

// =============================================================================
// API Shapes
// =============================================================================

export const GcpInstanceSchema = Type.Object({
  name: Type.String(),
  id: Type.Optional(Type.String()),
  zone: Type.Optional(Type.String()),
  machineType: Type.Optional(Type.String()),
  status: Type.Optional(Type.String()),
});

export const GcpDiskSchema = Type.Object({
  name: Type.String(),
  zone: Type.Optional(Type.String()),
  // int64 fields arrive as strings
  sizeGb: Type.Optional(Type.Union([Type.String(), Type.Number()])),
  type: Type.Optional(Type.String()),
  users: Type.Optional(Type.Array(Type.String())),
});

export const GcpBucketSchema = Type.Object({
  name: Type.String(),
  location: Type.Optional(Type.String()),
  storageClass: Type.Optional(Type.String()),
  lifecycle: Type.Optional(
    Type.Object({
      rule: Type.Optional(Type.Array(Type.Unknown())),
    }),
  ),
});

export type GcpInstance = Static<typeof GcpInstanceSchema>;
export type GcpDisk = Static<typeof GcpDiskSchema>;
export type GcpBucket = Static<typeof GcpBucketSchema>;

// =============================================================================
// Client Interface
// =============================================================================

export interface GcpScanClient {
  listInstances(): Promise<GcpInstance[]>;
  listDisks(): Promise<GcpDisk[]>;
  listBuckets(): Promise<GcpBucket[]>;
}

export class RestGcpScanClient implements GcpScanClient {
  private projectId: string;
  private getToken: () => Promise<string>;
  private retry?: RetryOptions;
  private token: Promise<string> | null = null;

  constructor(projectId: string, options: { getToken?: () => Promise<string>; retry?: RetryOptions } = {}) {
    this.projectId = projectId;
    this.getToken = options.getToken ?? (() => resolveGcpAccessToken());
    this.retry = options.retry;
  }

  private accessToken(): Promise<string> {
    this.token ??= this.getToken();
    return this.token;
  }

  private project(): string {
    return encodeURIComponent(this.projectId);
  }

  async listInstances(): Promise<GcpInstance[]> {
    const token = await this.accessToken();
    const url = `${COMPUTE_API}/projects/${this.project()}/aggregated/instances`;
    return withRetry(() => gcpAggregatedList(url, token, "instances", GcpInstanceSchema), this.retry);
  }

  async listDisks(): Promise<GcpDisk[]> {
    const token = await this.accessToken();
    const url = `${COMPUTE_API}/projects/${this.project()}/aggregated/disks`;
    return withRetry(() => gcpAggregatedList(url, token, "disks", GcpDiskSchema), this.retry);
  }

  async listBuckets(): Promise<GcpBucket[]> {
    const token = await this.accessToken();
    const url = `${STORAGE_API}/b?project=${this.project()}`;
    return withRetry(() => gcpList(url, token, "items", GcpBucketSchema), this.retry);
  }
}

// =============================================================================
// Probe
// =============================================================================

function diskSize(disk: GcpDisk): number {
  const size = Number(disk.sizeGb ?? 0);
  return Number.isFinite(size) ? size : 0;
}

function zoneOf(path: string | undefined): string | undefined {
  return path ? shortName(path) : undefined;
}

export type GcpProbeOptions = {
  projectId: string;
  client?: GcpScanClient;
  logger?: Logger;
  retry?: RetryOptions;
};

export class GcpProbe implements ProviderProbe {
  readonly id = "gcp";
  private client: GcpScanClient;
  private logger: Logger;
  private warnings: string[] = [];

  constructor(options: GcpProbeOptions) {
    this.client = options.client ?? new RestGcpScanClient(options.projectId, { retry: options.retry });
    this.logger = options.logger ?? createLogger("gcp");
  }

  async scan(): Promise<ProbeReport> {
    this.warnings = [];
    return {
      results: {
        "Compute Instances": toCategoryPayload(
          await this.section("compute instances", () => this.findTerminatedInstances()),
        ),
        "Persistent Disks": toCategoryPayload(await this.section("persistent disks", () => this.findUnusedDisks())),
        "Cloud Storage": toCategoryPayload(
          await this.section("storage buckets", () => this.findBucketsWithoutLifecycle()),
        ),
      },
      warnings: this.warnings,
    };
  }

  private async section(label: string, run: () => Promise<Finding[]>): Promise<Finding[]> {
    try {
      return await run();
    } catch (error) {
      const message = `GCP ${label}: ${formatErrorMessage(error)}`;
      this.warnings.push(message);
      this.logger.warn(message);
      return [];
    }
  }

  private async findTerminatedInstances(): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const instance of await this.client.listInstances()) {
      if (instance.status !== "TERMINATED") continue;
      const machineType = instance.machineType ? shortName(instance.machineType) : undefined;
      findings.push({
        resourceId: instance.name,
        resourceType: "Compute Instance",
        region: zoneOf(instance.zone),
        issue: "Instance is terminated",
        recommendation: "Delete if no longer needed",
        currentConfig: machineType,
        estimatedMonthlySavings: estimateGcpInstanceSavings(machineType),
        confidence: 0.9,
      });
    }
    return findings;
  }

  private async findUnusedDisks(): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const disk of await this.client.listDisks()) {
      if (disk.users && disk.users.length > 0) continue;
      const size = diskSize(disk);
      const diskType = disk.type ? shortName(disk.type) : undefined;
      findings.push({
        resourceId: disk.name,
        resourceType: "Persistent Disk",
        region: zoneOf(disk.zone),
        issue: "Disk not attached to any instance",
        recommendation: "Delete if not needed or create snapshot",
        currentConfig: diskType ? `${size}GB ${diskType}` : `${size}GB`,
        estimatedMonthlySavings: estimateGcpDiskSavings(size),
        confidence: 0.95,
      });
    }
    return findings;
  }

  private async findBucketsWithoutLifecycle(): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const bucket of await this.client.listBuckets()) {
      if ((bucket.lifecycle?.rule ?? []).length > 0) continue;
      findings.push({
        resourceId: bucket.name,
        resourceType: "Cloud Storage Bucket",
        region: bucket.location?.toLowerCase(),
        issue: "No lifecycle policy",
        recommendation: "Configure lifecycle rules to move or delete old objects",
        currentConfig: bucket.storageClass,
        estimatedMonthlySavings: GCS_LIFECYCLE_MONTHLY_SAVINGS,
        confidence: 0.65,
      });
    }
    return findings;
  }
}

export function createGcpProbe(options: GcpProbeOptions): GcpProbe {
  return new GcpProbe(options);
}
