import { describe, it, expect } from "vitest";
import { createMemoryLogger } from "../logging/logger.js";
import {
  AzureProbe,
  mapDisk,
  mapStorageAccount,
  mapVirtualMachine,
  type AzureDiskRecord,
  type AzureScanClient,
  type AzureStorageAccountRecord,
  type AzureVmRecord,
} from "./azure.js";

const RG = "/subscriptions/sub-1/resourceGroups/rg-app/providers";

function fakeClient(data: {
  vms?: AzureVmRecord[] | Error;
  disks?: AzureDiskRecord[] | Error;
  accounts?: AzureStorageAccountRecord[] | Error;
}): AzureScanClient {
  const resolve = async <T>(value: T[] | Error | undefined): Promise<T[]> => {
    if (value instanceof Error) throw value;
    return value ?? [];
  };
  return {
    listVirtualMachines: () => resolve(data.vms),
    listDisks: () => resolve(data.disks),
    listStorageAccounts: () => resolve(data.accounts),
  };
}

function makeProbe(client: AzureScanClient) {
  const { logger, transport } = createMemoryLogger();
  return { probe: new AzureProbe({ subscriptionId: "sub-1", client, logger }), transport };
}

describe("AzureProbe", () => {
  it("flags VMs that are stopped but still allocated", async () => {
    const { probe } = makeProbe(
      fakeClient({
        vms: [
          { id: `${RG}/Microsoft.Compute/virtualMachines/web-1`, name: "web-1", location: "eastus", vmSize: "Standard_D2s_v3", powerState: "PowerState/stopped" },
          { id: `${RG}/Microsoft.Compute/virtualMachines/web-2`, name: "web-2", location: "eastus", vmSize: "Standard_D2s_v3", powerState: "PowerState/deallocated" },
          { id: `${RG}/Microsoft.Compute/virtualMachines/web-3`, name: "web-3", location: "eastus", vmSize: "Standard_D2s_v3", powerState: "PowerState/running" },
        ],
      }),
    );

    const vms = (await probe.scan()).results["Virtual Machines"];
    expect(vms?.count).toBe(1);
    expect(vms?.items?.[0]).toMatchObject({
      resourceId: `${RG}/Microsoft.Compute/virtualMachines/web-1`,
      resourceType: "Virtual Machine",
      region: "eastus",
      currentConfig: "Standard_D2s_v3",
      estimatedMonthlySavings: 70,
      confidence: 1.0,
    });
  });

  it("prices unknown VM sizes at the default", async () => {
    const { probe } = makeProbe(
      fakeClient({ vms: [{ id: "vm-x", name: "x", vmSize: "Standard_M128s", powerState: "PowerState/stopped" }] }),
    );
    expect((await probe.scan()).results["Virtual Machines"]?.savings).toBe(100);
  });

  it("flags disks without an owner", async () => {
    const { probe } = makeProbe(
      fakeClient({
        disks: [
          { id: "disk-free", name: "disk-free", location: "westus", sizeGb: 128, sku: "Premium_LRS" },
          { id: "disk-used", name: "disk-used", sizeGb: 64, managedBy: `${RG}/Microsoft.Compute/virtualMachines/web-1` },
        ],
      }),
    );

    const disks = (await probe.scan()).results["Managed Disks"];
    expect(disks?.items?.map((d) => [d.resourceId, d.currentConfig, d.estimatedMonthlySavings, d.confidence])).toEqual([
      ["disk-free", "128GB Premium_LRS", 6.4, 0.95],
    ]);
  });

  it("flags Premium-tier storage accounts", async () => {
    const { probe } = makeProbe(
      fakeClient({
        accounts: [
          { id: "sa-hot", name: "sahot", accessTier: "Hot" },
          { id: "sa-premium", name: "sapremium", accessTier: "Premium", sku: "Premium_LRS" },
        ],
      }),
    );

    const accounts = (await probe.scan()).results["Storage Accounts"];
    expect(accounts?.items?.map((a) => [a.resourceId, a.estimatedMonthlySavings, a.confidence])).toEqual([
      ["sa-premium", 30, 0.6],
    ]);
  });

  it("records a warning per failing section and scans the rest", async () => {
    const { probe, transport } = makeProbe(
      fakeClient({
        vms: new Error("AuthorizationFailed"),
        disks: [{ id: "d", name: "d", sizeGb: 10 }],
      }),
    );

    const report = await probe.scan();
    expect(report.results["Virtual Machines"]).toEqual({ count: 0, savings: 0, items: [] });
    expect(report.results["Managed Disks"]?.count).toBe(1);
    expect(report.warnings).toEqual(["Azure virtual machines: AuthorizationFailed"]);
    expect(transport.messages("warn")).toEqual(report.warnings);
  });
});

describe("SDK mapping", () => {
  it("reads the power state from the instance view", () => {
    const record = mapVirtualMachine({
      location: "eastus",
      id: "vm-id",
      name: "vm",
      hardwareProfile: { vmSize: "Standard_B2s" },
      instanceView: {
        statuses: [{ code: "ProvisioningState/succeeded" }, { code: "PowerState/stopped" }],
      },
    });
    expect(record).toEqual({
      id: "vm-id",
      name: "vm",
      location: "eastus",
      vmSize: "Standard_B2s",
      powerState: "PowerState/stopped",
    });
  });

  it("maps disks and storage accounts", () => {
    expect(mapDisk({ location: "westus", id: "disk-id", name: "disk", diskSizeGB: 32 })).toEqual({
      id: "disk-id",
      name: "disk",
      location: "westus",
      sizeGb: 32,
      managedBy: undefined,
      sku: undefined,
    });
    expect(mapStorageAccount({ location: "westus", name: "acct", accessTier: "Premium" })).toMatchObject({
      id: "acct",
      accessTier: "Premium",
    });
  });
});
