/**
 * AWS probe: idle EC2 and RDS instances, unattached EBS volumes and
 * Elastic IPs, and S3 buckets without lifecycle rules.
 */

import {
  EC2Client,
  DescribeAddressesCommand,
  DescribeInstancesCommand,
  DescribeVolumesCommand,
  type Address,
  type Instance,
  type Volume,
} from "@aws-sdk/client-ec2";
import { CloudWatchClient, GetMetricStatisticsCommand } from "@aws-sdk/client-cloudwatch";
import { RDSClient, DescribeDBInstancesCommand, type DBInstance } from "@aws-sdk/client-rds";
import {
  S3Client,
  GetBucketLifecycleConfigurationCommand,
  ListBucketsCommand,
  type Bucket,
} from "@aws-sdk/client-s3";
import { fromIni } from "@aws-sdk/credential-providers";
import type { AwsConfig } from "../config/schema.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { Finding, ProviderResults } from "../types.js";
import {
  ELASTIC_IP_MONTHLY_PRICE,
  S3_LIFECYCLE_MONTHLY_SAVINGS,
  estimateEbsSavings,
  estimateEc2Savings,
  estimateRdsSavings,
} from "./pricing.js";
import { formatErrorMessage, withRetry, type RetryOptions } from "./retry.js";
import { average, toCategoryPayload, type ProbeReport, type ProviderProbe } from "./types.js";

// =============================================================================
// Thresholds
// =============================================================================

export const EC2_IDLE_CPU_PERCENT = 10;
export const RDS_IDLE_CPU_PERCENT = 20;
/** Assumed when CloudWatch has no datapoints; above both thresholds. */
export const ASSUMED_CPU_PERCENT = 50;
export const EC2_DOWNSIZE_REDUCTION = 0.5;
export const RDS_DOWNSIZE_REDUCTION = 0.3;

// =============================================================================
// Client Interface
// =============================================================================

export type CpuMetricQuery = {
  region: string;
  namespace: "AWS/EC2" | "AWS/RDS";
  dimensionName: "InstanceId" | "DBInstanceIdentifier";
  dimensionValue: string;
  lookbackDays: number;
};

/** The AWS calls the probe needs. */
export interface AwsScanClient {
  listInstances(region: string): Promise<Instance[]>;
  listVolumes(region: string): Promise<Volume[]>;
  listAddresses(region: string): Promise<Address[]>;
  listDbInstances(region: string): Promise<DBInstance[]>;
  /** Average of daily CPU averages, or null without datapoints. */
  getAverageCpu(query: CpuMetricQuery): Promise<number | null>;
  listBuckets(): Promise<Bucket[]>;
  hasLifecycleConfiguration(bucket: string): Promise<boolean>;
}

// =============================================================================
// SDK-backed Client
// =============================================================================

type AwsCredentials = ReturnType<typeof fromIni> | undefined;

/** SDK-level retries are off; calls go through `withRetry` instead. */
export function awsClientConfig(region: string, credentials?: AwsCredentials) {
  return { region, credentials, maxAttempts: 1 };
}

/**
 * Bucket listing is global and served from us-east-1; lifecycle lookups for
 * buckets in other regions follow the PermanentRedirect to the bucket's region.
 */
export function s3ClientConfig(credentials?: AwsCredentials) {
  return { ...awsClientConfig("us-east-1", credentials), followRegionRedirects: true };
}

export class SdkAwsScanClient implements AwsScanClient {
  private credentials: AwsCredentials;
  private retry?: RetryOptions;
  private ec2Clients = new Map<string, EC2Client>();
  private rdsClients = new Map<string, RDSClient>();
  private cloudWatchClients = new Map<string, CloudWatchClient>();
  private s3Client: S3Client | null = null;

  constructor(options: { profile?: string; retry?: RetryOptions } = {}) {
    this.credentials = options.profile ? fromIni({ profile: options.profile }) : undefined;
    this.retry = options.retry;
  }

  private ec2(region: string): EC2Client {
    let client = this.ec2Clients.get(region);
    if (!client) {
      client = new EC2Client(awsClientConfig(region, this.credentials));
      this.ec2Clients.set(region, client);
    }
    return client;
  }

  private rds(region: string): RDSClient {
    let client = this.rdsClients.get(region);
    if (!client) {
      client = new RDSClient(awsClientConfig(region, this.credentials));
      this.rdsClients.set(region, client);
    }
    return client;
  }

  private cloudWatch(region: string): CloudWatchClient {
    let client = this.cloudWatchClients.get(region);
    if (!client) {
      client = new CloudWatchClient(awsClientConfig(region, this.credentials));
      this.cloudWatchClients.set(region, client);
    }
    return client;
  }

  private s3(): S3Client {
    if (!this.s3Client) {
      this.s3Client = new S3Client(s3ClientConfig(this.credentials));
    }
    return this.s3Client;
  }

  async listInstances(region: string): Promise<Instance[]> {
    const instances: Instance[] = [];
    let nextToken: string | undefined;
    do {
      const response = await withRetry(
        () =>
          this.ec2(region).send(
            new DescribeInstancesCommand({
              Filters: [{ Name: "instance-state-name", Values: ["running"] }],
              NextToken: nextToken,
            }),
          ),
        this.retry,
      );
      for (const reservation of response.Reservations ?? []) {
        instances.push(...(reservation.Instances ?? []));
      }
      nextToken = response.NextToken;
    } while (nextToken);
    return instances;
  }

  async listVolumes(region: string): Promise<Volume[]> {
    const volumes: Volume[] = [];
    let nextToken: string | undefined;
    do {
      const response = await withRetry(
        () =>
          this.ec2(region).send(
            new DescribeVolumesCommand({
              Filters: [{ Name: "status", Values: ["available"] }],
              NextToken: nextToken,
            }),
          ),
        this.retry,
      );
      volumes.push(...(response.Volumes ?? []));
      nextToken = response.NextToken;
    } while (nextToken);
    return volumes;
  }

  async listAddresses(region: string): Promise<Address[]> {
    const response = await withRetry(() => this.ec2(region).send(new DescribeAddressesCommand({})), this.retry);
    return response.Addresses ?? [];
  }

  async listDbInstances(region: string): Promise<DBInstance[]> {
    const databases: DBInstance[] = [];
    let marker: string | undefined;
    do {
      const response = await withRetry(
        () => this.rds(region).send(new DescribeDBInstancesCommand({ Marker: marker })),
        this.retry,
      );
      databases.push(...(response.DBInstances ?? []));
      marker = response.Marker;
    } while (marker);
    return databases;
  }

  async getAverageCpu(query: CpuMetricQuery): Promise<number | null> {
    const endTime = new Date();
    const startTime = new Date(endTime.getTime() - query.lookbackDays * 24 * 60 * 60 * 1000);
    const response = await withRetry(
      () =>
        this.cloudWatch(query.region).send(
          new GetMetricStatisticsCommand({
            Namespace: query.namespace,
            MetricName: "CPUUtilization",
            Dimensions: [{ Name: query.dimensionName, Value: query.dimensionValue }],
            StartTime: startTime,
            EndTime: endTime,
            Period: 86_400,
            Statistics: ["Average"],
          }),
        ),
      this.retry,
    );
    const values = (response.Datapoints ?? [])
      .map((dp) => dp.Average)
      .filter((v): v is number => typeof v === "number");
    return average(values);
  }

  async listBuckets(): Promise<Bucket[]> {
    const response = await withRetry(() => this.s3().send(new ListBucketsCommand({})), this.retry);
    return response.Buckets ?? [];
  }

  async hasLifecycleConfiguration(bucket: string): Promise<boolean> {
    try {
      const response = await withRetry(
        () => this.s3().send(new GetBucketLifecycleConfigurationCommand({ Bucket: bucket })),
        this.retry,
      );
      return (response.Rules ?? []).length > 0;
    } catch (error) {
      if (error instanceof Error && error.name === "NoSuchLifecycleConfiguration") return false;
      throw error;
    }
  }
}

// =============================================================================
// Probe
// =============================================================================

export type AwsProbeOptions = {
  config: AwsConfig;
  client?: AwsScanClient;
  logger?: Logger;
  retry?: RetryOptions;
};

export class AwsProbe implements ProviderProbe {
  readonly id = "aws";
  private config: AwsConfig;
  private client: AwsScanClient;
  private logger: Logger;
  private warnings: string[] = [];

  constructor(options: AwsProbeOptions) {
    this.config = options.config;
    this.client = options.client ?? new SdkAwsScanClient({ profile: options.config.profile, retry: options.retry });
    this.logger = options.logger ?? createLogger("aws");
  }

  async scan(): Promise<ProbeReport> {
    this.warnings = [];

    const results: ProviderResults = {
      "EC2 Instances": toCategoryPayload(await this.perRegion("EC2 instances", (r) => this.findIdleInstances(r))),
      "EBS Volumes": toCategoryPayload(await this.perRegion("EBS volumes", (r) => this.findUnattachedVolumes(r))),
      "Elastic IPs": toCategoryPayload(await this.perRegion("Elastic IPs", (r) => this.findUnattachedAddresses(r))),
      "RDS Databases": toCategoryPayload(await this.perRegion("RDS instances", (r) => this.findIdleDatabases(r))),
      "S3 Storage": toCategoryPayload(await this.findBucketsWithoutLifecycle()),
    };

    return { results, warnings: this.warnings };
  }

  /** Run a section for every configured region, skipping regions that fail. */
  private async perRegion(label: string, section: (region: string) => Promise<Finding[]>): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const region of this.config.regions) {
      try {
        findings.push(...(await section(region)));
      } catch (error) {
        this.warn(`${label} in ${region}: ${formatErrorMessage(error)}`);
      }
    }
    return findings;
  }

  private warn(message: string): void {
    this.warnings.push(message);
    this.logger.warn(message);
  }

  private async averageCpu(query: CpuMetricQuery): Promise<number> {
    try {
      return (await this.client.getAverageCpu(query)) ?? ASSUMED_CPU_PERCENT;
    } catch (error) {
      this.logger.debug(`CPU metrics unavailable for ${query.dimensionValue}: ${formatErrorMessage(error)}`);
      return ASSUMED_CPU_PERCENT;
    }
  }

  private async findIdleInstances(region: string): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const instance of await this.client.listInstances(region)) {
      if (!instance.InstanceId || instance.State?.Name !== "running") continue;

      const cpu = await this.averageCpu({
        region,
        namespace: "AWS/EC2",
        dimensionName: "InstanceId",
        dimensionValue: instance.InstanceId,
        lookbackDays: this.config.lookbackDays,
      });
      if (cpu >= EC2_IDLE_CPU_PERCENT) continue;

      findings.push({
        resourceId: instance.InstanceId,
        resourceType: "EC2 Instance",
        region,
        issue: "Low CPU utilization",
        recommendation: "Consider downsizing or stopping",
        currentConfig: instance.InstanceType,
        cpuUtilization: cpu,
        estimatedMonthlySavings: estimateEc2Savings(instance.InstanceType, EC2_DOWNSIZE_REDUCTION),
        confidence: 0.9,
      });
    }
    return findings;
  }

  private async findUnattachedVolumes(region: string): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const volume of await this.client.listVolumes(region)) {
      if (!volume.VolumeId || volume.State !== "available") continue;

      const size = volume.Size ?? 0;
      const volumeType = volume.VolumeType ?? "gp2";
      findings.push({
        resourceId: volume.VolumeId,
        resourceType: "EBS Volume",
        region,
        issue: "Unattached volume",
        recommendation: "Delete if not needed or create snapshot",
        currentConfig: `${size}GB ${volumeType}`,
        estimatedMonthlySavings: estimateEbsSavings(size, volumeType),
        confidence: 0.99,
      });
    }
    return findings;
  }

  private async findUnattachedAddresses(region: string): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const address of await this.client.listAddresses(region)) {
      if (address.InstanceId) continue;
      const resourceId = address.AllocationId ?? address.PublicIp;
      if (!resourceId) continue;

      findings.push({
        resourceId,
        resourceType: "Elastic IP",
        region,
        issue: "Unattached Elastic IP",
        recommendation: "Release if not needed",
        estimatedMonthlySavings: ELASTIC_IP_MONTHLY_PRICE,
        confidence: 1.0,
      });
    }
    return findings;
  }

  private async findIdleDatabases(region: string): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const db of await this.client.listDbInstances(region)) {
      if (!db.DBInstanceIdentifier) continue;

      const cpu = await this.averageCpu({
        region,
        namespace: "AWS/RDS",
        dimensionName: "DBInstanceIdentifier",
        dimensionValue: db.DBInstanceIdentifier,
        lookbackDays: this.config.lookbackDays,
      });
      if (cpu >= RDS_IDLE_CPU_PERCENT) continue;

      findings.push({
        resourceId: db.DBInstanceIdentifier,
        resourceType: "RDS Instance",
        region,
        issue: "Low CPU utilization",
        recommendation: "Consider downsizing",
        currentConfig: db.DBInstanceClass,
        cpuUtilization: cpu,
        estimatedMonthlySavings: estimateRdsSavings(db.DBInstanceClass, RDS_DOWNSIZE_REDUCTION),
        confidence: 0.85,
      });
    }
    return findings;
  }

  private async findBucketsWithoutLifecycle(): Promise<Finding[]> {
    let buckets: Bucket[];
    try {
      buckets = await this.client.listBuckets();
    } catch (error) {
      this.warn(`S3 buckets: ${formatErrorMessage(error)}`);
      return [];
    }

    const findings: Finding[] = [];
    for (const bucket of buckets) {
      if (!bucket.Name) continue;

      let hasLifecycle: boolean;
      try {
        hasLifecycle = await this.client.hasLifecycleConfiguration(bucket.Name);
      } catch (error) {
        this.warn(`S3 bucket ${bucket.Name}: ${formatErrorMessage(error)}`);
        continue;
      }
      if (hasLifecycle) continue;

      findings.push({
        resourceId: bucket.Name,
        resourceType: "S3 Bucket",
        issue: "No lifecycle policy",
        recommendation: "Implement lifecycle policy to move old data to cheaper storage",
        estimatedMonthlySavings: S3_LIFECYCLE_MONTHLY_SAVINGS,
        confidence: 0.7,
      });
    }
    return findings;
  }
}

export function createAwsProbe(options: AwsProbeOptions): AwsProbe {
  return new AwsProbe(options);
}
