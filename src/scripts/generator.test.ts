import { mkdtempSync, readFileSync, rmSync, statSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { FindingRecord, RunArtifact } from "../analysis/artifact.js";
import { generateScripts, isScriptType, renderShellScripts, renderTerraform, sanitizeLine, terraformLabel } from "./generator.js";

function finding(resourceId: string, overrides: Partial<FindingRecord> = {}): FindingRecord {
  return {
    resource_id: resourceId,
    resource_type: "Resource",
    issue: "Issue",
    recommendation: "Fix",
    estimated_monthly_savings: 5,
    confidence: 0.9,
    ...overrides,
  };
}

function bucketOf(items: FindingRecord[]) {
  return { count: items.length, savings: items.length * 5, items };
}

function sampleArtifact(): RunArtifact {
  const volumes = Array.from({ length: 7 }, (_, i) => finding(`vol-${i}`, { region: "us-east-1" }));
  return {
    timestamp: "2026-03-01T12:00:00.000Z",
    categories: {
      "EBS Volumes": bucketOf(volumes),
      "Elastic IPs": bucketOf([finding("eipalloc-1\nrm -rf /", { region: "eu-west-1" })]),
      "S3 Storage": bucketOf(["logs-a", "logs-b", "logs-c", "logs-d"].map((name) => finding(name))),
      "Managed Disks": bucketOf([finding("/subscriptions/s/disks/data-1")]),
      "Persistent Disks": bucketOf([finding("pd-1", { region: "us-central1-a" })]),
    },
    recommendations: [],
    total_savings: 70,
  };
}

function fileContent(files: { name: string; content: string }[], name: string): string {
  return files.find((f) => f.name === name)?.content ?? "";
}

describe("helpers", () => {
  it("keeps values on one line", () => {
    expect(sanitizeLine("a\nb\r\n\tc ")).toBe("a b c");
  });

  it("builds valid Terraform labels", () => {
    expect(terraformLabel("vol-0abc")).toBe("vol_0abc");
    expect(terraformLabel("1bucket.logs")).toBe("r_1bucket_logs");
  });

  it("validates script types", () => {
    expect(isScriptType("shell")).toBe(true);
    expect(isScriptType("ansible")).toBe(false);
  });
});

describe("renderTerraform", () => {
  it("stubs at most five disks per category with per-cloud resource types", () => {
    const main = fileContent(renderTerraform(sampleArtifact()), "main.tf");

    expect(main.match(/# Remove unattached disk: vol-/g)).toHaveLength(5);
    expect(main).toContain('# resource "aws_ebs_volume" "vol_0" {');
    expect(main).not.toContain("vol-5");
    expect(main).toContain('# resource "azurerm_managed_disk" "_subscriptions_s_disks_data_1" {');
    expect(main).toContain('# resource "google_compute_disk" "pd_1" {');
  });

  it("adds lifecycle rules for at most three buckets", () => {
    const main = fileContent(renderTerraform(sampleArtifact()), "main.tf");

    expect(main.match(/resource "aws_s3_bucket_lifecycle_configuration"/g)).toHaveLength(3);
    expect(main).toContain('resource "aws_s3_bucket_lifecycle_configuration" "logs_a" {\n  bucket = "logs-a"');
    expect(main).not.toContain("logs-d");
  });

  it("states the total in the README", () => {
    const readme = fileContent(renderTerraform(sampleArtifact()), "README.md");
    expect(readme).toContain("**Potential Monthly Savings:** $70.00");
  });
});

describe("renderShellScripts", () => {
  it("emits one script per cloud with findings", () => {
    const names = renderShellScripts(sampleArtifact()).map((f) => f.name);
    expect(names).toEqual(["cleanup_aws.sh", "cleanup_azure.sh", "cleanup_gcp.sh"]);

    const awsOnly: RunArtifact = { ...sampleArtifact(), categories: { "Elastic IPs": bucketOf([finding("eip")]) } };
    expect(renderShellScripts(awsOnly).map((f) => f.name)).toEqual(["cleanup_aws.sh"]);
  });

  it("comments out every command", () => {
    const aws = fileContent(renderShellScripts(sampleArtifact()), "cleanup_aws.sh");
    const lines = aws.split("\n");

    expect(lines[0]).toBe("#!/bin/bash");
    expect(lines).toContain("# aws ec2 delete-volume --volume-id vol-0 --region us-east-1");
    expect(lines).toContain("# aws ec2 release-address --allocation-id eipalloc-1 rm -rf / --region eu-west-1");
    expect(lines.filter((l) => l.includes("aws ec2")).every((l) => l.startsWith("# "))).toBe(true);
    expect(lines.filter((l) => l.includes("delete-volume"))).toHaveLength(7);
  });

  it("uses cloud-native commands for Azure and GCP", () => {
    const files = renderShellScripts(sampleArtifact());
    expect(fileContent(files, "cleanup_azure.sh")).toContain("# az disk delete --ids /subscriptions/s/disks/data-1 --yes\n");
    expect(fileContent(files, "cleanup_gcp.sh")).toContain("# gcloud compute disks delete pd-1 --zone=us-central1-a --quiet\n");
  });
});

describe("generateScripts", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "economizer-scripts-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes every file and marks shell scripts executable", () => {
    const out = join(dir, "scripts");
    const paths = generateScripts(sampleArtifact(), "all", out);

    expect(paths.map((p) => basename(p))).toEqual([
      "main.tf",
      "variables.tf",
      "README.md",
      "cleanup_aws.sh",
      "cleanup_azure.sh",
      "cleanup_gcp.sh",
    ]);
    expect(statSync(join(out, "cleanup_aws.sh")).mode & 0o777).toBe(0o755);
    expect(readFileSync(join(out, "variables.tf"), "utf-8")).toContain('variable "dry_run"');
  });

  it("writes only the requested kind", () => {
    const paths = generateScripts(sampleArtifact(), "terraform", dir);
    expect(paths.map((p) => basename(p))).toEqual(["main.tf", "variables.tf", "README.md"]);
  });
});
