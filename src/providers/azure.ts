/**
 * Azure probe: stopped (still billed) VMs, unattached managed disks and
 * Premium-tier storage accounts.
 */

import type { TokenCredential } from "@azure/identity";
import type { VirtualMachine, Disk } from "@azure/arm-compute";
import type { StorageAccount } from "@azure/arm-storage";
import type { AzureConfig } from "../config/schema.js";
import { createLogger, type Logger } from "../logging/logger.js";
import type { Finding } from "../types.js";
import {
  AZURE_PREMIUM_STORAGE_MONTHLY_SAVINGS,
  estimateAzureDiskSavings,
  estimateAzureVmSavings,
} from "./pricing.js";
import { formatErrorMessage, withRetry, type RetryOptions } from "./retry.js";
import { toCategoryPayload, type ProbeReport, type ProviderProbe } from "./types.js";

// =============================================================================
// Client Interface
// =============================================================================

export type AzureVmRecord = {
  id: string;
  name: string;
  location?: string;
  vmSize?: string;
  /** e.g. "PowerState/running", "PowerState/stopped". */
  powerState?: string;
};

export type AzureDiskRecord = {
  id: string;
  name: string;
  location?: string;
  sizeGb: number;
  managedBy?: string;
  sku?: string;
};

export type AzureStorageAccountRecord = {
  id: string;
  name: string;
  location?: string;
  accessTier?: string;
  sku?: string;
};

export interface AzureScanClient {
  listVirtualMachines(): Promise<AzureVmRecord[]>;
  listDisks(): Promise<AzureDiskRecord[]>;
  listStorageAccounts(): Promise<AzureStorageAccountRecord[]>;
}

// =============================================================================
// SDK-backed Client
// =============================================================================

export function powerStateOf(vm: VirtualMachine): string | undefined {
  return vm.instanceView?.statuses?.find((s) => s.code?.startsWith("PowerState/"))?.code;
}

export function mapVirtualMachine(vm: VirtualMachine): AzureVmRecord {
  return {
    id: vm.id ?? vm.name ?? "",
    name: vm.name ?? "",
    location: vm.location,
    vmSize: vm.hardwareProfile?.vmSize,
    powerState: powerStateOf(vm),
  };
}

export function mapDisk(disk: Disk): AzureDiskRecord {
  return {
    id: disk.id ?? disk.name ?? "",
    name: disk.name ?? "",
    location: disk.location,
    sizeGb: disk.diskSizeGB ?? 0,
    managedBy: disk.managedBy,
    sku: disk.sku?.name,
  };
}

export function mapStorageAccount(account: StorageAccount): AzureStorageAccountRecord {
  return {
    id: account.id ?? account.name ?? "",
    name: account.name ?? "",
    location: account.location,
    accessTier: account.accessTier,
    sku: account.sku?.name,
  };
}

export class SdkAzureScanClient implements AzureScanClient {
  private subscriptionId: string;
  private retry?: RetryOptions;
  private credential: TokenCredential | null = null;

  constructor(subscriptionId: string, options: { credential?: TokenCredential; retry?: RetryOptions } = {}) {
    this.subscriptionId = subscriptionId;
    this.credential = options.credential ?? null;
    this.retry = options.retry;
  }

  private async getCredential(): Promise<TokenCredential> {
    if (!this.credential) {
      const { DefaultAzureCredential } = await import("@azure/identity");
      this.credential = new DefaultAzureCredential();
    }
    return this.credential;
  }

  private async getComputeClient() {
    const credential = await this.getCredential();
    const { ComputeManagementClient } = await import("@azure/arm-compute");
    return new ComputeManagementClient(credential, this.subscriptionId);
  }

  private async getStorageClient() {
    const credential = await this.getCredential();
    const { StorageManagementClient } = await import("@azure/arm-storage");
    return new StorageManagementClient(credential, this.subscriptionId);
  }

  async listVirtualMachines(): Promise<AzureVmRecord[]> {
    const client = await this.getComputeClient();
    return withRetry(async () => {
      const vms: AzureVmRecord[] = [];
      // statusOnly populates instanceView with the power state.
      for await (const vm of client.virtualMachines.listAll({ statusOnly: "true" })) {
        vms.push(mapVirtualMachine(vm));
      }
      return vms;
    }, this.retry);
  }

  async listDisks(): Promise<AzureDiskRecord[]> {
    const client = await this.getComputeClient();
    return withRetry(async () => {
      const disks: AzureDiskRecord[] = [];
      for await (const disk of client.disks.list()) {
        disks.push(mapDisk(disk));
      }
      return disks;
    }, this.retry);
  }

  async listStorageAccounts(): Promise<AzureStorageAccountRecord[]> {
    const client = await this.getStorageClient();
    return withRetry(async () => {
      const accounts: AzureStorageAccountRecord[] = [];
      for await (const account of client.storageAccounts.list()) {
        accounts.push(mapStorageAccount(account));
      }
      return accounts;
    }, this.retry);
  }
}

// =============================================================================
// Probe
// =============================================================================

export const STOPPED_POWER_STATE = "PowerState/stopped";

export type AzureProbeOptions = {
  subscriptionId: string;
  client?: AzureScanClient;
  logger?: Logger;
  retry?: RetryOptions;
};

export class AzureProbe implements ProviderProbe {
  readonly id = "azure";
  private client: AzureScanClient;
  private logger: Logger;
  private warnings: string[] = [];

  constructor(options: AzureProbeOptions) {
    this.client = options.client ?? new SdkAzureScanClient(options.subscriptionId, { retry: options.retry });
    this.logger = options.logger ?? createLogger("azure");
  }

  async scan(): Promise<ProbeReport> {
    this.warnings = [];
    return {
      results: {
        "Virtual Machines": toCategoryPayload(await this.section("virtual machines", () => this.findStoppedVms())),
        "Managed Disks": toCategoryPayload(await this.section("managed disks", () => this.findUnattachedDisks())),
        "Storage Accounts": toCategoryPayload(
          await this.section("storage accounts", () => this.findPremiumStorageAccounts()),
        ),
      },
      warnings: this.warnings,
    };
  }

  private async section(label: string, run: () => Promise<Finding[]>): Promise<Finding[]> {
    try {
      return await run();
    } catch (error) {
      const message = `Azure ${label}: ${formatErrorMessage(error)}`;
      this.warnings.push(message);
      this.logger.warn(message);
      return [];
    }
  }

  private async findStoppedVms(): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const vm of await this.client.listVirtualMachines()) {
      // Deallocated VMs are not billed for compute; only "stopped" ones are.
      if (vm.powerState !== STOPPED_POWER_STATE) continue;
      findings.push({
        resourceId: vm.id,
        resourceType: "Virtual Machine",
        region: vm.location,
        issue: "VM is stopped but not deallocated",
        recommendation: "Deallocate the VM to stop compute charges",
        currentConfig: vm.vmSize,
        estimatedMonthlySavings: estimateAzureVmSavings(vm.vmSize),
        confidence: 1.0,
      });
    }
    return findings;
  }

  private async findUnattachedDisks(): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const disk of await this.client.listDisks()) {
      if (disk.managedBy) continue;
      findings.push({
        resourceId: disk.id,
        resourceType: "Managed Disk",
        region: disk.location,
        issue: "Unattached disk",
        recommendation: "Delete if not needed or create snapshot",
        currentConfig: disk.sku ? `${disk.sizeGb}GB ${disk.sku}` : `${disk.sizeGb}GB`,
        estimatedMonthlySavings: estimateAzureDiskSavings(disk.sizeGb),
        confidence: 0.95,
      });
    }
    return findings;
  }

  private async findPremiumStorageAccounts(): Promise<Finding[]> {
    const findings: Finding[] = [];
    for (const account of await this.client.listStorageAccounts()) {
      if (account.accessTier !== "Premium") continue;
      findings.push({
        resourceId: account.id,
        resourceType: "Storage Account",
        region: account.location,
        issue: "Premium storage tier",
        recommendation: "Review access patterns and move to Hot or Cool tier",
        currentConfig: account.sku,
        estimatedMonthlySavings: AZURE_PREMIUM_STORAGE_MONTHLY_SAVINGS,
        confidence: 0.6,
      });
    }
    return findings;
  }
}

export function createAzureProbe(options: AzureProbeOptions): AzureProbe {
  return new AzureProbe(options);
}
