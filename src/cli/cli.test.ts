/**
 * Tests for the cloud-economizer commands: analyze, report and generate.
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type { AnalysisReport, ProbeFactories } from "../analysis/analyzer.js";
import { createMemoryLogger } from "../logging/logger.js";
import { toCategoryPayload } from "../providers/types.js";
import { table, type CliRuntime } from "./cli-utils.js";
import { buildProgram } from "./program/build-program.js";
import { formatAnalysisSummary } from "./program/register.analyze.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

type Captured = { logs: string[]; errors: string[]; exitCode: number | null };

function makeRuntime(): { runtime: CliRuntime; captured: Captured } {
  const captured: Captured = { logs: [], errors: [], exitCode: null };
  const runtime: CliRuntime = {
    log: (message) => captured.logs.push(message),
    error: (message) => captured.errors.push(message),
    exit: (code) => {
      captured.exitCode = code;
    },
  };
  return { runtime, captured };
}

const fakeProbes: Partial<ProbeFactories> = {
  aws: () => ({
    id: "aws",
    scan: async () => ({
      results: {
        "EBS Volumes": toCategoryPayload([
          {
            resourceId: "vol-1",
            resourceType: "EBS Volume",
            region: "us-east-1",
            issue: "Unattached volume",
            recommendation: "Delete if not needed or create snapshot",
            estimatedMonthlySavings: 10,
            confidence: 0.95,
            currentConfig: "100GB gp2",
          },
        ]),
      },
      warnings: ["EC2 instances in eu-west-1: UnauthorizedOperation"],
    }),
  }),
};

async function run(args: string[]) {
  const { runtime, captured } = makeRuntime();
  const { logger } = createMemoryLogger();
  const program = buildProgram({ runtime, probes: fakeProbes, logger });
  program.exitOverride();
  await program.parseAsync(["node", "cloud-economizer", ...args]);
  return captured;
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe("table", () => {
  it("pads columns and right-aligns numeric ones", () => {
    expect(table(["A", "Qty"], [["x", "5"]], [1]).split("\n")).toEqual([" A │ Qty ", "───┼─────", " x │   5 "]);
  });
});

describe("formatAnalysisSummary", () => {
  it("lists mode and warnings after the table", () => {
    const report: AnalysisReport = {
      run: {
        timestamp: "2026-03-01T12:00:00.000Z",
        categories: { "Elastic IPs": { count: 0, savings: 0, items: [] } },
        recommendations: [],
        totalSavings: 0,
      },
      outcome: {
        status: "degraded",
        mode: "basic",
        reason: "missing-credential",
        message: "AI features enabled but OPENAI_API_KEY not set",
        recommendations: [],
      },
      providers: ["aws"],
      warnings: ["S3 buckets: no credentials"],
      artifactPath: null,
    };

    const lines = formatAnalysisSummary(report);
    expect(lines[0]).toBe("Analysis Summary");
    expect(lines[1]).not.toContain("Elastic IPs");
    expect(lines.slice(2)).toEqual([
      "Recommendation mode: basic (degraded: missing-credential)",
      "Warnings (1):",
      "  - S3 buckets: no credentials",
    ]);
  });
});

describe("cloud-economizer CLI", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "economizer-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(): string {
    const path = join(dir, "config.json");
    writeFileSync(path, JSON.stringify({ aws: { regions: ["us-east-1"] }, analysis: { outputDir: join(dir, "output") } }));
    return path;
  }

  it("registers the three commands", () => {
    const { runtime } = makeRuntime();
    const names = buildProgram({ runtime }).commands.map((c) => c.name());
    expect(names).toEqual(["analyze", "report", "generate"]);
  });

  it("analyzes, then reports and generates from the saved results", async () => {
    const artifactPath = join(dir, "output", "analysis_results.json");

    const analyzed = await run(["analyze", "--provider", "aws", "--config", writeConfig()]);
    expect(analyzed.exitCode).toBeNull();
    expect(analyzed.logs[0]).toBe("Analysis Summary");
    expect(analyzed.logs[1]?.split("\n")[2]).toBe(" EBS Volumes │        1 │               $10.00 ");
    expect(analyzed.logs).toContain("Recommendation mode: basic");
    expect(analyzed.logs).toContain("  - EC2 instances in eu-west-1: UnauthorizedOperation");
    expect(analyzed.logs).toContain(`Results saved to ${artifactPath}`);
    expect(existsSync(artifactPath)).toBe(true);

    const reportPath = join(dir, "report.csv");
    const reported = await run(["report", "--format", "csv", "--output", reportPath, "--data", artifactPath]);
    expect(reported.logs).toEqual([`Report saved to ${reportPath}`]);
    expect(readFileSync(reportPath, "utf-8").split("\n")[1]).toBe(
      "EBS Volumes,vol-1,EBS Volume,us-east-1,Unattached volume,Delete if not needed or create snapshot,10.00,0.95",
    );

    const scriptsDir = join(dir, "scripts");
    const generated = await run(["generate", "--type", "shell", "--output", scriptsDir, "--data", artifactPath]);
    expect(generated.logs).toEqual([
      "Generated 1 file(s):",
      `  ${join(scriptsDir, "cleanup_aws.sh")}`,
      "Review every script before running it; destructive commands are commented out.",
    ]);
  });

  it("rejects an unknown provider", async () => {
    const captured = await run(["analyze", "--provider", "oracle", "--config", writeConfig()]);
    expect(captured.errors).toEqual(['Error: Unknown provider "oracle"; expected aws, azure, gcp or all']);
    expect(captured.exitCode).toBe(1);
  });

  it("fails when no analysis data exists", async () => {
    const missing = join(dir, "missing.json");
    const captured = await run(["report", "--data", missing]);
    expect(captured.errors).toEqual([
      `Error: Analysis data not found at ${missing}. Run 'cloud-economizer analyze' first.`,
    ]);
    expect(captured.exitCode).toBe(1);
  });

  it("rejects an unknown report format", async () => {
    const captured = await run(["report", "--format", "pdf"]);
    expect(captured.errors).toEqual(['Error: Unknown report format "pdf"; expected html, json or csv']);
    expect(captured.exitCode).toBe(1);
  });

  it("rejects an unknown script type", async () => {
    const captured = await run(["generate", "--type", "ansible"]);
    expect(captured.errors).toEqual(['Error: Unknown script type "ansible"; expected terraform, shell or all']);
  });
});
