/**
 * Pricing heuristics: approximate on-demand monthly prices (USD) used to
 * estimate savings. Not billing-accurate.
 */

export const EC2_MONTHLY_PRICES: Readonly<Record<string, number>> = {
  "t2.micro": 8.5,
  "t2.small": 17,
  "t2.medium": 34,
  "t3.micro": 7.5,
  "t3.small": 15,
  "t3.medium": 30,
  "m5.large": 70,
  "m5.xlarge": 140,
  "m5.2xlarge": 280,
};
export const EC2_DEFAULT_MONTHLY_PRICE = 100;

export const RDS_MONTHLY_PRICES: Readonly<Record<string, number>> = {
  "db.t2.micro": 15,
  "db.t2.small": 30,
  "db.t3.micro": 14,
  "db.t3.small": 27,
  "db.m5.large": 135,
  "db.m5.xlarge": 270,
};
export const RDS_DEFAULT_MONTHLY_PRICE = 150;

/** Per GB-month. */
export const EBS_GB_MONTHLY_PRICES: Readonly<Record<string, number>> = {
  gp2: 0.1,
  gp3: 0.08,
  io1: 0.125,
  io2: 0.125,
  sc1: 0.025,
  st1: 0.045,
};
export const EBS_DEFAULT_GB_MONTHLY_PRICE = 0.1;

/** ~$0.005/hour for an unattached address. */
export const ELASTIC_IP_MONTHLY_PRICE = 3.6;
export const S3_LIFECYCLE_MONTHLY_SAVINGS = 50;

export const AZURE_VM_MONTHLY_PRICES: Readonly<Record<string, number>> = {
  Standard_B1s: 8,
  Standard_B2s: 30,
  Standard_D2s_v3: 70,
  Standard_D4s_v3: 140,
  Standard_D8s_v3: 280,
};
export const AZURE_VM_DEFAULT_MONTHLY_PRICE = 100;
export const AZURE_DISK_GB_MONTHLY_PRICE = 0.05;
export const AZURE_PREMIUM_STORAGE_MONTHLY_SAVINGS = 30;

export const GCP_MACHINE_MONTHLY_PRICES: Readonly<Record<string, number>> = {
  "e2-micro": 6,
  "e2-small": 12,
  "e2-medium": 24,
  "n1-standard-1": 25,
  "n1-standard-2": 50,
  "n1-standard-4": 100,
};
export const GCP_MACHINE_DEFAULT_MONTHLY_PRICE = 80;
export const GCP_DISK_GB_MONTHLY_PRICE = 0.04;
export const GCS_LIFECYCLE_MONTHLY_SAVINGS = 40;

function lookup(table: Readonly<Record<string, number>>, key: string | undefined, fallback: number): number {
  if (key === undefined) return fallback;
  return Object.prototype.hasOwnProperty.call(table, key) ? (table[key] ?? fallback) : fallback;
}

/** Savings from shrinking an instance by `reduction` of its price. */
export function estimateEc2Savings(instanceType: string | undefined, reduction: number): number {
  return lookup(EC2_MONTHLY_PRICES, instanceType, EC2_DEFAULT_MONTHLY_PRICE) * reduction;
}

export function estimateRdsSavings(dbClass: string | undefined, reduction: number): number {
  return lookup(RDS_MONTHLY_PRICES, dbClass, RDS_DEFAULT_MONTHLY_PRICE) * reduction;
}

export function estimateEbsSavings(sizeGb: number, volumeType: string | undefined): number {
  return sizeGb * lookup(EBS_GB_MONTHLY_PRICES, volumeType, EBS_DEFAULT_GB_MONTHLY_PRICE);
}

export function estimateAzureVmSavings(vmSize: string | undefined): number {
  return lookup(AZURE_VM_MONTHLY_PRICES, vmSize, AZURE_VM_DEFAULT_MONTHLY_PRICE);
}

export function estimateAzureDiskSavings(sizeGb: number): number {
  return sizeGb * AZURE_DISK_GB_MONTHLY_PRICE;
}

export function estimateGcpInstanceSavings(machineType: string | undefined): number {
  return lookup(GCP_MACHINE_MONTHLY_PRICES, machineType, GCP_MACHINE_DEFAULT_MONTHLY_PRICE);
}

export function estimateGcpDiskSavings(sizeGb: number): number {
  return sizeGb * GCP_DISK_GB_MONTHLY_PRICE;
}
