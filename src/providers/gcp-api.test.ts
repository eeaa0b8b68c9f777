import { describe, it, expect, vi, afterEach } from "vitest";
import { Type } from "@sinclair/typebox";
import {
  GCP_TOKEN_ENV,
  GcpApiError,
  gcpAggregatedList,
  gcpList,
  gcpRequest,
  resolveGcpAccessToken,
  shortName,
} from "./gcp-api.js";

const NamedSchema = Type.Object({ name: Type.String() });

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}

describe("gcpRequest", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends a bearer token", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => jsonResponse({ ok: true }));
    vi.stubGlobal("fetch", fetchMock);

    await expect(gcpRequest("https://example.test/v1/thing", "test-token")).resolves.toEqual({ ok: true });
    const headers = fetchMock.mock.calls[0]?.[1]?.headers;
    expect(headers).toMatchObject({ Authorization: "Bearer test-token" });
  });

  it("raises GcpApiError with status, code and retry-after", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse(
          { error: { code: 429, message: "Quota exceeded", status: "RESOURCE_EXHAUSTED" } },
          { status: 429, headers: { "retry-after": "3" } },
        ),
      ),
    );

    const error = await gcpRequest("https://example.test", "test-token").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GcpApiError);
    expect(error).toMatchObject({
      message: "Quota exceeded",
      statusCode: 429,
      code: "RESOURCE_EXHAUSTED",
      headers: { "retry-after": "3" },
    });
  });

  it("falls back to a generic message for non-JSON errors", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html>bad gateway</html>", { status: 502 })));

    await expect(gcpRequest("https://example.test", "test-token")).rejects.toThrow("GCP API error: HTTP 502");
  });
});

describe("paginated lists", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("follows nextPageToken and drops items that fail the schema", async () => {
    const fetchMock = vi
      .fn(async (_url: string, _init?: RequestInit) => jsonResponse({}))
      .mockResolvedValueOnce(jsonResponse({ items: [{ name: "a" }, { id: 7 }], nextPageToken: "p 2" }))
      .mockResolvedValueOnce(jsonResponse({ items: [{ name: "b" }] }));
    vi.stubGlobal("fetch", fetchMock);

    const items = await gcpList("https://example.test/b?project=p", "test-token", "items", NamedSchema);

    expect(items).toEqual([{ name: "a" }, { name: "b" }]);
    expect(fetchMock.mock.calls[1]?.[0]).toBe("https://example.test/b?project=p&pageToken=p%202");
  });

  it("flattens aggregated scopes", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({
          items: {
            "zones/a": { disks: [{ name: "d1" }] },
            "zones/b": { disks: [{ name: "d2" }, { name: "d3" }] },
            "zones/c": {},
          },
        }),
      ),
    );

    const disks = await gcpAggregatedList("https://example.test/aggregated/disks", "test-token", "disks", NamedSchema);
    expect(disks.map((d) => d.name)).toEqual(["d1", "d2", "d3"]);
  });
});

describe("shortName", () => {
  it("returns the last path segment", () => {
    expect(shortName("projects/p/zones/us-central1-a/machineTypes/e2-small")).toBe("e2-small");
    expect(shortName("plain")).toBe("plain");
  });
});

describe("resolveGcpAccessToken", () => {
  it("prefers the environment token", async () => {
    const run = vi.fn(async () => "cli-token\n");
    await expect(resolveGcpAccessToken({ env: { [GCP_TOKEN_ENV]: " env-token " }, run })).resolves.toBe("env-token");
    expect(run).not.toHaveBeenCalled();
  });

  it("falls back to the gcloud CLI", async () => {
    const run = vi.fn(async (_command: string) => "cli-token\n");
    await expect(resolveGcpAccessToken({ env: {}, run })).resolves.toBe("cli-token");
    expect(run).toHaveBeenCalledWith("gcloud auth print-access-token");
  });

  it("rejects an empty CLI token", async () => {
    await expect(resolveGcpAccessToken({ env: {}, run: async () => "  \n" })).rejects.toThrow(
      "gcloud CLI returned empty access token",
    );
  });
});
