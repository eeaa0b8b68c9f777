/**
 * Report Generator
 *
 * Renders a run artifact as JSON, CSV (one row per finding) or a
 * standalone HTML page.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { serializeArtifact, type FindingRecord, type RunArtifact } from "../analysis/artifact.js";

export type ReportFormat = "html" | "json" | "csv";

export const REPORT_FORMATS: readonly ReportFormat[] = ["html", "json", "csv"];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((f) => f === value);
}

export function renderReport(artifact: RunArtifact, format: ReportFormat): string {
  switch (format) {
    case "json":
      return serializeArtifact(artifact);
    case "csv":
      return formatCsv(artifact);
    case "html":
      return formatHtml(artifact);
  }
}

/** Render and write a report; returns the output path. */
export function generateReport(artifact: RunArtifact, format: ReportFormat, outputPath: string): string {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, renderReport(artifact, format));
  return outputPath;
}

// =============================================================================
// CSV Format
// =============================================================================

export const CSV_HEADER = [
  "Category",
  "Resource ID",
  "Resource Type",
  "Region",
  "Issue",
  "Recommendation",
  "Estimated Monthly Savings",
  "Confidence",
];

/** Quote a field when it contains a delimiter, quote or line break. */
export function csvEscape(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCsv(artifact: RunArtifact): string {
  const lines = [CSV_HEADER.join(",")];
  for (const [category, record] of Object.entries(artifact.categories)) {
    for (const item of record.items) {
      lines.push(
        [
          category,
          item.resource_id,
          item.resource_type,
          item.region ?? "",
          item.issue,
          item.recommendation,
          item.estimated_monthly_savings.toFixed(2),
          String(item.confidence),
        ]
          .map(csvEscape)
          .join(","),
      );
    }
  }
  return `${lines.join("\n")}\n`;
}

// =============================================================================
// HTML Format
// =============================================================================

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatUsd(amount: number): string {
  return `$${amount.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}

function formatHtml(artifact: RunArtifact): string {
  const findingCount = Object.values(artifact.categories).reduce((sum, c) => sum + c.count, 0);

  const recommendationRows = artifact.recommendations.map((r) =>
    [
      r.category,
      r.priority,
      String(r.finding_count),
      formatUsd(r.total_savings),
      formatUsd(r.average_savings_per_item),
      r.risk_level,
      r.effort,
      r.recommendation,
    ],
  );

  const categorySections = Object.entries(artifact.categories)
    .filter(([, record]) => record.items.length > 0)
    .map(([category, record]) =>
      buildHtmlTable(
        `${category} (${record.count}, ${formatUsd(record.savings)}/month)`,
        ["Resource ID", "Type", "Region", "Issue", "Recommendation", "Savings/mo", "Confidence"],
        record.items.map(findingRow),
      ),
    )
    .join("\n");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Cloud Economizer Report</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 1100px; margin: 40px auto; padding: 0 20px; color: #1a1a2e; background: #f8f9fa; }
    h1 { color: #0d1117; border-bottom: 2px solid #0969da; padding-bottom: 8px; }
    h2 { color: #24292f; margin-top: 32px; }
    table { border-collapse: collapse; width: 100%; margin: 16px 0; }
    th, td { border: 1px solid #d0d7de; padding: 8px 12px; text-align: left; }
    th { background: #f6f8fa; font-weight: 600; }
    tr:nth-child(even) { background: #f6f8fa; }
    .summary-box { background: #fff; border: 1px solid #d0d7de; border-radius: 6px; padding: 16px 24px; margin: 16px 0; }
    .savings { color: #1a7f37; font-weight: 600; }
    .meta { color: #656d76; font-size: 0.9em; }
  </style>
</head>
<body>
  <h1>Cloud Economizer Report</h1>
  <p class="meta">Generated: ${escapeHtml(artifact.timestamp)}</p>

  <div class="summary-box">
    <h2>Summary</h2>
    <table>
      <tr><td>Potential Monthly Savings</td><td class="savings">${escapeHtml(formatUsd(artifact.total_savings))}</td></tr>
      <tr><td>Findings</td><td><strong>${findingCount}</strong></td></tr>
      <tr><td>Categories</td><td>${Object.keys(artifact.categories).length}</td></tr>
    </table>
  </div>
${buildHtmlTable(
  "Recommendations",
  ["Category", "Priority", "Findings", "Total Savings", "Avg/Item", "Risk", "Effort", "Action"],
  recommendationRows,
)}
${categorySections}
</body>
</html>
`;
}

function findingRow(item: FindingRecord): string[] {
  return [
    item.resource_id,
    item.resource_type,
    item.region ?? "",
    item.issue,
    item.recommendation,
    formatUsd(item.estimated_monthly_savings),
    item.confidence.toFixed(2),
  ];
}

function buildHtmlTable(title: string, headers: string[], rows: string[][]): string {
  if (rows.length === 0) return "";

  const headerRow = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
  const body = rows
    .map((row) => `<tr>${row.map((c) => `<td>${escapeHtml(c)}</td>`).join("")}</tr>`)
    .join("\n      ");

  return `
  <h2>${escapeHtml(title)}</h2>
  <table>
    <thead><tr>${headerRow}</tr></thead>
    <tbody>
      ${body}
    </tbody>
  </table>`;
}
