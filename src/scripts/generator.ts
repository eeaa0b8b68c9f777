/**
 * Script Generator
 *
 * Renders advisory Terraform and shell scripts from a run artifact. Every
 * destructive command is emitted commented out.
 */

import { chmodSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { CategoryRecord, FindingRecord, RunArtifact } from "../analysis/artifact.js";

export type ScriptType = "terraform" | "shell" | "all";

export const SCRIPT_TYPES: readonly ScriptType[] = ["terraform", "shell", "all"];

export const TERRAFORM_DISK_LIMIT = 5;
export const TERRAFORM_BUCKET_LIMIT = 3;
export const SHELL_ITEM_LIMIT = 10;

export function isScriptType(value: string): value is ScriptType {
  return SCRIPT_TYPES.some((t) => t === value);
}

export type GeneratedFile = { name: string; content: string; executable: boolean };

/** Write the requested scripts into `outputDir`; returns the written paths. */
export function generateScripts(artifact: RunArtifact, type: ScriptType, outputDir: string): string[] {
  mkdirSync(outputDir, { recursive: true });

  const files: GeneratedFile[] = [];
  if (type === "terraform" || type === "all") files.push(...renderTerraform(artifact));
  if (type === "shell" || type === "all") files.push(...renderShellScripts(artifact));

  return files.map((file) => {
    const path = join(outputDir, file.name);
    writeFileSync(path, file.content);
    if (file.executable) chmodSync(path, 0o755);
    return path;
  });
}

// =============================================================================
// Helpers
// =============================================================================

/** Collapse line breaks and control characters so a value stays on one comment line. */
export function sanitizeLine(value: string): string {
  return value.replace(/[\u0000-\u001f\u007f]+/g, " ").trim();
}

/** Terraform resource label from an arbitrary id. */
export function terraformLabel(id: string): string {
  const label = id.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[A-Za-z_]/.test(label) ? label : `r_${label}`;
}

function usd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

function itemsOf(artifact: RunArtifact, category: string): FindingRecord[] {
  return artifact.categories[category]?.items ?? [];
}

function hasCategory(artifact: RunArtifact, fragments: string[]): boolean {
  return Object.keys(artifact.categories).some((name) => fragments.some((f) => name.includes(f)));
}

// =============================================================================
// Terraform
// =============================================================================

const TERRAFORM_HEADER = `# Cloud Economizer - Generated Optimization Scripts
# Review carefully before applying!

terraform {
  required_version = ">= 1.0"
  required_providers {
    aws = {
      source  = "hashicorp/aws"
      version = "~> 5.0"
    }
  }
}

provider "aws" {
  region = var.aws_region
}
`;

const TERRAFORM_VARIABLES = `variable "aws_region" {
  description = "AWS region"
  type        = string
  default     = "us-east-1"
}

variable "dry_run" {
  description = "Perform a dry run without making changes"
  type        = bool
  default     = true
}
`;

function diskResourceType(category: string): string {
  if (category.includes("Managed")) return "azurerm_managed_disk";
  if (category.includes("Persistent")) return "google_compute_disk";
  return "aws_ebs_volume";
}

function renderDiskStubs(category: string, record: CategoryRecord): string {
  const resourceType = diskResourceType(category);
  let tf = `\n# ${category} Cleanup\n`;
  for (const item of record.items.slice(0, TERRAFORM_DISK_LIMIT)) {
    const id = sanitizeLine(item.resource_id);
    if (!id) continue;
    tf += `
# Remove unattached disk: ${id}
# Estimated savings: ${usd(item.estimated_monthly_savings)}/month
# resource "${resourceType}" "${terraformLabel(id)}" {
#   # This disk should be deleted
#   # Import it, then run terraform destroy to remove
# }
`;
  }
  return tf;
}

function renderS3Lifecycle(record: CategoryRecord): string {
  let tf = "\n# S3 Lifecycle Policies\n";
  for (const item of record.items.slice(0, TERRAFORM_BUCKET_LIMIT)) {
    const bucket = sanitizeLine(item.resource_id);
    if (!bucket) continue;
    tf += `
resource "aws_s3_bucket_lifecycle_configuration" "${terraformLabel(bucket)}" {
  bucket = ${JSON.stringify(bucket)}

  rule {
    id     = "transition-old-data"
    status = "Enabled"

    transition {
      days          = 30
      storage_class = "STANDARD_IA"
    }

    transition {
      days          = 90
      storage_class = "GLACIER"
    }

    expiration {
      days = 365
    }
  }
}
`;
  }
  return tf;
}

function renderTerraformReadme(artifact: RunArtifact): string {
  return `# Cloud Economizer - Terraform Scripts

## Overview
These Terraform scripts implement cost optimizations identified by Cloud Economizer.

**Potential Monthly Savings:** ${usd(artifact.total_savings)}

## Usage

1. Review the generated scripts carefully
2. Initialize Terraform:
   \`\`\`bash
   terraform init
   \`\`\`

3. Preview changes:
   \`\`\`bash
   terraform plan
   \`\`\`

4. Apply changes (when ready):
   \`\`\`bash
   terraform apply
   \`\`\`

## Safety Notes

- Always run \`terraform plan\` first
- Test in non-production environments
- Have backups before deleting resources
- Review each change individually

## Generated Files

- \`main.tf\` - Main configuration
- \`variables.tf\` - Configuration variables
`;
}

export function renderTerraform(artifact: RunArtifact): GeneratedFile[] {
  let main = TERRAFORM_HEADER;
  for (const [category, record] of Object.entries(artifact.categories)) {
    if (category.includes("EBS") || category.includes("Disk")) {
      main += renderDiskStubs(category, record);
    } else if (category.includes("S3")) {
      main += renderS3Lifecycle(record);
    }
  }

  return [
    { name: "main.tf", content: main, executable: false },
    { name: "variables.tf", content: TERRAFORM_VARIABLES, executable: false },
    { name: "README.md", content: renderTerraformReadme(artifact), executable: false },
  ];
}

// =============================================================================
// Shell Scripts
// =============================================================================

function shellPreamble(cloud: string): string {
  const title = `Cloud Economizer - ${cloud} Cleanup Script`;
  return `#!/bin/bash
# ${title}
# Review and modify before running!

set -e

echo "${title}"
echo "${"=".repeat(title.length)}"
echo ""
echo "WARNING: Commands below delete resources. Review carefully!"
echo ""
read -p "Continue? (yes/no): " confirm

if [ "$confirm" != "yes" ]; then
    echo "Aborted."
    exit 0
fi

`;
}

const SHELL_FOOTER = `
echo ""
echo "Cleanup complete!"
echo "Note: Commands are commented out by default. Review and uncomment to execute."
`;

type CommandSection = {
  category: string;
  heading: string;
  command: (item: FindingRecord) => string;
};

function renderSections(artifact: RunArtifact, sections: CommandSection[]): string {
  let script = "";
  for (const section of sections) {
    const items = itemsOf(artifact, section.category);
    if (items.length === 0) continue;

    script += `# ${section.heading}\n`;
    script += `echo '${section.heading}...'\n`;
    for (const item of items.slice(0, SHELL_ITEM_LIMIT)) {
      script += `# ${sanitizeLine(section.command(item))}\n`;
    }
    script += "\n";
  }
  return script;
}

function zoneFlag(item: FindingRecord): string {
  return item.region ? ` --zone=${item.region}` : "";
}

function awsRegionFlag(item: FindingRecord): string {
  return ` --region ${item.region ?? "$AWS_REGION"}`;
}

function renderAwsScript(artifact: RunArtifact): string {
  return (
    shellPreamble("AWS") +
    `# Fallback region for findings without one
AWS_REGION="\${AWS_REGION:-us-east-1}"

echo "Default region: $AWS_REGION"
echo ""

` +
    renderSections(artifact, [
      {
        category: "EBS Volumes",
        heading: "Delete unattached EBS volumes",
        command: (item) => `aws ec2 delete-volume --volume-id ${item.resource_id}${awsRegionFlag(item)}`,
      },
      {
        category: "Elastic IPs",
        heading: "Release unattached Elastic IPs",
        command: (item) => `aws ec2 release-address --allocation-id ${item.resource_id}${awsRegionFlag(item)}`,
      },
      {
        category: "EC2 Instances",
        heading: "Stop idle EC2 instances",
        command: (item) => `aws ec2 stop-instances --instance-ids ${item.resource_id}${awsRegionFlag(item)}`,
      },
    ]) +
    SHELL_FOOTER
  );
}

function renderAzureScript(artifact: RunArtifact): string {
  return (
    shellPreamble("Azure") +
    renderSections(artifact, [
      {
        category: "Virtual Machines",
        heading: "Deallocate stopped VMs",
        command: (item) => `az vm deallocate --ids ${item.resource_id}`,
      },
      {
        category: "Managed Disks",
        heading: "Delete unattached managed disks",
        command: (item) => `az disk delete --ids ${item.resource_id} --yes`,
      },
    ]) +
    SHELL_FOOTER
  );
}

function renderGcpScript(artifact: RunArtifact): string {
  return (
    shellPreamble("GCP") +
    renderSections(artifact, [
      {
        category: "Compute Instances",
        heading: "Delete terminated instances",
        command: (item) => `gcloud compute instances delete ${item.resource_id}${zoneFlag(item)} --quiet`,
      },
      {
        category: "Persistent Disks",
        heading: "Delete unattached persistent disks",
        command: (item) => `gcloud compute disks delete ${item.resource_id}${zoneFlag(item)} --quiet`,
      },
    ]) +
    SHELL_FOOTER
  );
}

export function renderShellScripts(artifact: RunArtifact): GeneratedFile[] {
  const files: GeneratedFile[] = [];
  if (hasCategory(artifact, ["EC2", "EBS", "Elastic"])) {
    files.push({ name: "cleanup_aws.sh", content: renderAwsScript(artifact), executable: true });
  }
  if (hasCategory(artifact, ["Virtual", "Managed"])) {
    files.push({ name: "cleanup_azure.sh", content: renderAzureScript(artifact), executable: true });
  }
  if (hasCategory(artifact, ["Compute", "Persistent"])) {
    files.push({ name: "cleanup_gcp.sh", content: renderGcpScript(artifact), executable: true });
  }
  return files;
}
