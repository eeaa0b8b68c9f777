/**
 * Shared CLI plumbing: output runtime, user-facing errors, table layout.
 */

export type CliRuntime = {
  log: (message: string) => void;
  error: (message: string) => void;
  /** Record the process exit code without terminating. */
  exit: (code: number) => void;
};

export const defaultRuntime: CliRuntime = {
  log: (message) => console.log(message),
  error: (message) => console.error(message),
  exit: (code) => {
    process.exitCode = code;
  },
};

/** An error whose message is shown to the user as-is. */
export class CliError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "CliError";
    this.exitCode = exitCode;
  }
}

export async function runCommandWithRuntime(runtime: CliRuntime, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    runtime.exit(error instanceof CliError ? error.exitCode : 1);
  }
}

/** Plain-text table; numeric columns are right-aligned. */
export function table(headers: string[], rows: string[][], alignRight: number[] = []): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const formatRow = (cells: string[]) =>
    cells
      .map((c, i) => {
        const width = widths[i] ?? 0;
        return ` ${alignRight.includes(i) ? c.padStart(width) : c.padEnd(width)} `;
      })
      .join("│");
  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}
