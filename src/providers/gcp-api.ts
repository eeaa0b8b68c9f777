/**
 * GCP REST helpers: authenticated `fetch` with Bearer tokens, page
 * walking for list and aggregated-list endpoints, and access token lookup.
 *
 * Response items are validated against a TypeBox schema; items that do
 * not match are dropped.
 */

import { exec as execCb } from "node:child_process";
import { promisify } from "node:util";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const execAsync = promisify(execCb);

export const GCP_TOKEN_ENV = "GOOGLE_OAUTH_ACCESS_TOKEN";

// =============================================================================
// Errors
// =============================================================================

export class GcpApiError extends Error {
  readonly statusCode: number;
  readonly code: string;
  readonly headers?: Record<string, string>;

  constructor(message: string, statusCode: number, code: string, headers?: Record<string, string>) {
    super(message);
    this.name = "GcpApiError";
    this.statusCode = statusCode;
    this.code = code;
    this.headers = headers;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Core Request
// =============================================================================

export type GcpRequestOptions = {
  timeout?: number;
};

/** GET a GCP REST endpoint and return the parsed body. */
export async function gcpRequest(url: string, token: string, opts?: GcpRequestOptions): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), opts?.timeout ?? 30_000);

  try {
    const res = await fetch(url, {
      method: "GET",
      headers: {
        Authorization: `Bearer ${token}`,
        Accept: "application/json",
      },
      signal: controller.signal,
    });

    if (!res.ok) {
      const body: unknown = await res.json().catch(() => ({}));
      const errObj = isRecord(body) && isRecord(body.error) ? body.error : {};
      const message = typeof errObj.message === "string" ? errObj.message : `GCP API error: HTTP ${res.status}`;
      const rawCode = errObj.status ?? errObj.code ?? "";
      const retryAfter = res.headers.get("retry-after");
      throw new GcpApiError(
        message,
        res.status,
        String(rawCode),
        retryAfter ? { "retry-after": retryAfter } : undefined,
      );
    }

    if (res.status === 204 || res.headers.get("content-length") === "0") return {};
    const data: unknown = await res.json();
    return data;
  } finally {
    clearTimeout(timer);
  }
}

function withPageToken(url: string, pageToken: string | undefined): string {
  if (!pageToken) return url;
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}pageToken=${encodeURIComponent(pageToken)}`;
}

function nextPageTokenOf(data: unknown): string | undefined {
  return isRecord(data) && typeof data.nextPageToken === "string" ? data.nextPageToken : undefined;
}

function matching<S extends TSchema>(schema: S, value: unknown): Static<S>[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is Static<S> => Value.Check(schema, item));
}

// =============================================================================
// Paginated Lists
// =============================================================================

/** Fetch every page of a list API, collecting the items under `listKey`. */
export async function gcpList<S extends TSchema>(
  url: string,
  token: string,
  listKey: string,
  schema: S,
  maxPages = 50,
): Promise<Static<S>[]> {
  const results: Static<S>[] = [];
  let pageToken: string | undefined;
  let page = 0;

  do {
    const data = await gcpRequest(withPageToken(url, pageToken), token);
    if (isRecord(data)) results.push(...matching(schema, data[listKey]));
    pageToken = nextPageTokenOf(data);
    page++;
  } while (pageToken && page < maxPages);

  return results;
}

/**
 * Fetch a Compute Engine aggregated list. Responses group items by scope:
 * `{ items: { "zones/us-central1-a": { instances: [...] } } }`.
 */
export async function gcpAggregatedList<S extends TSchema>(
  url: string,
  token: string,
  itemKey: string,
  schema: S,
): Promise<Static<S>[]> {
  const results: Static<S>[] = [];
  let pageToken: string | undefined;

  do {
    const data = await gcpRequest(withPageToken(url, pageToken), token);
    const scopes = isRecord(data) && isRecord(data.items) ? data.items : {};
    for (const scope of Object.values(scopes)) {
      if (isRecord(scope)) results.push(...matching(schema, scope[itemKey]));
    }
    pageToken = nextPageTokenOf(data);
  } while (pageToken);

  return results;
}

/**
 * Short name from a self-link,
 * e.g. "projects/p/zones/us-central1-a/machineTypes/n1-standard-1" → "n1-standard-1".
 */
export function shortName(fullPath: string): string {
  return fullPath.split("/").pop() ?? fullPath;
}

// =============================================================================
// Access Token
// =============================================================================

export type TokenSourceOptions = {
  env?: NodeJS.ProcessEnv;
  /** Runs a shell command and returns its stdout. */
  run?: (command: string) => Promise<string>;
};

async function runCommand(command: string): Promise<string> {
  const { stdout } = await execAsync(command);
  return stdout;
}

/** Access token from GOOGLE_OAUTH_ACCESS_TOKEN, else `gcloud auth print-access-token`. */
export async function resolveGcpAccessToken(options: TokenSourceOptions = {}): Promise<string> {
  const env = options.env ?? process.env;
  const fromEnv = env[GCP_TOKEN_ENV]?.trim();
  if (fromEnv) return fromEnv;

  const stdout = await (options.run ?? runCommand)("gcloud auth print-access-token");
  const token = stdout.trim();
  if (!token) throw new Error("gcloud CLI returned empty access token");
  return token;
}
