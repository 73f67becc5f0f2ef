import { describe, it, expect, vi, beforeEach } from "vitest";
import { loadConfig } from "../config";
import { FatalFetchError, TransientFetchError } from "../errors";
import {
  TEST_API_KEY,
  TEST_ORG_ID,
  createFakeDashboard,
  wireRecord,
} from "../test/fakeDashboard";
import { resolveTimeWindow } from "../window";
import { createDashboardClient, usageRequestsUrl } from "./client";

const window = resolveTimeWindow(1, new Date("2026-10-19T12:00:00.000Z"));

function testConfig(overrides: Record<string, string> = {}) {
  return loadConfig({
    MERAKI_API_KEY: TEST_API_KEY,
    ORG_ID: TEST_ORG_ID,
    MAX_ATTEMPTS: "3",
    BACKOFF_BASE_MS: "0",
    ...overrides,
  });
}

const noSleep = async () => undefined;

const A = wireRecord({ ts: "2026-10-19T09:00:00Z", method: "GET", responseCode: 200 });
const B = wireRecord({ ts: "2026-10-19T09:30:00Z", method: "POST", responseCode: 404 });
const C = wireRecord({ ts: "2026-10-19T10:00:00Z", method: "GET", responseCode: 200 });

describe("usageRequestsUrl", () => {
  it("encodes the window and page size", () => {
    expect(usageRequestsUrl(testConfig({ PER_PAGE: "500" }), window)).toBe(
      "https://api.meraki.com/api/v1/organizations/123456/apiRequests" +
        "?t0=2026-10-18T12%3A00%3A00.000Z&t1=2026-10-19T12%3A00%3A00.000Z&perPage=500",
    );
  });
});

describe("createDashboardClient", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("returns the concatenation of every page in order", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [A, B] }, { records: [C] }],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    const records = await client.fetchAll(window);

    expect(records).toEqual([A, B, C]);
    expect(fake.usageRequests()).toHaveLength(2);
  });

  it("follows the next link returned by the previous page", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [A] }, { records: [B] }, { records: [C] }],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    await client.fetchAll(window);

    const urls = fake.usageRequests().map((r) => new URL(r.url));
    expect(urls.map((u) => u.searchParams.get("startingAfter"))).toEqual([null, "1", "2"]);
    expect(urls.every((u) => u.searchParams.get("t0") === "2026-10-18T12:00:00.000Z")).toBe(true);
  });

  it("resolves a relative next link against the current page", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [A] }, { records: [B] }],
      relativeLinks: true,
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    expect(await client.fetchAll(window)).toEqual([A, B]);

    const urls = fake.usageRequests().map((r) => new URL(r.url));
    expect(urls.map((u) => u.host)).toEqual(["api.meraki.com", "api.meraki.com"]);
    expect(urls.map((u) => u.searchParams.get("startingAfter"))).toEqual([null, "1"]);
  });

  it("sends the API key as a bearer token", async () => {
    const fake = createFakeDashboard({ pages: [{ records: [A] }] });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    await client.fetchAll(window);

    expect(fake.requests[0].authorization).toBe("Bearer test-key");
  });

  it("stops at an empty page even when a next link is offered", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [], next: "1" }, { records: [A] }],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    expect(await client.fetchAll(window)).toEqual([]);
    expect(fake.usageRequests()).toHaveLength(1);
  });

  it("stops once the next cursor is past the end of the window", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [A], next: "2026-10-19T12:00:01Z" }],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    expect(await client.fetchAll(window)).toEqual([A]);
    expect(fake.usageRequests()).toHaveLength(1);
  });

  it("fills in optional fields the upstream leaves out", async () => {
    const fake = createFakeDashboard({
      pages: [
        {
          records: [
            {
              ts: "2026-10-19T09:00:00Z",
              method: "GET",
              path: "/api/v1/organizations",
              responseCode: 200,
              queryString: null,
            },
          ],
        },
      ],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    const [record] = await client.fetchAll(window);

    expect(record).toEqual({
      ts: "2026-10-19T09:00:00Z",
      adminId: "",
      method: "GET",
      host: "",
      path: "/api/v1/organizations",
      queryString: "",
      userAgent: "",
      sourceIp: "",
      responseCode: 200,
      latencyMs: null,
      operationId: "",
      version: null,
    });
  });

  it("pulls one page per step", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [A] }, { records: [B] }],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    const pages = client.pages(window);
    const first = await pages.next();

    if (first.done) throw new Error("expected a page");
    expect(first.value.records).toEqual([A]);
    expect(fake.usageRequests()).toHaveLength(1);

    await pages.return(undefined);
    expect(fake.usageRequests()).toHaveLength(1);
  });

  it("retries transient failures and then succeeds", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [A] }],
      failures: [503, 429],
    });
    const sleep = vi.fn(async (_ms: number) => undefined);
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep });

    expect(await client.fetchAll(window)).toEqual([A]);
    expect(fake.usageRequests()).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("retries a page whose body fails while streaming", async () => {
    const fake = createFakeDashboard({ pages: [{ records: [A] }] });
    let broken = true;
    const fetchFn = vi.fn(async (input: string, init?: RequestInit) => {
      if (!broken) return fake.fetchFn(input, init);
      broken = false;
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('[{"ts":'));
          controller.error(Object.assign(new Error("timed out"), { name: "TimeoutError" }));
        },
      });
      return new Response(body, { status: 200 });
    });
    const client = createDashboardClient(testConfig(), { fetchFn, sleep: noSleep });

    expect(await client.fetchAll(window)).toEqual([A]);
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("gives up with TransientFetchError when retries run out", async () => {
    const fake = createFakeDashboard({
      pages: [{ records: [A] }],
      failures: [503, 503, 503],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    await expect(client.fetchAll(window)).rejects.toBeInstanceOf(TransientFetchError);
    expect(fake.usageRequests()).toHaveLength(3);
  });

  it("aborts on a rejected credential without retrying", async () => {
    const fake = createFakeDashboard({ pages: [{ records: [A] }] });
    const client = createDashboardClient(testConfig({ MERAKI_API_KEY: "wrong-key" }), {
      fetchFn: fake.fetchFn,
      sleep: noSleep,
    });

    const err = await client.fetchAll(window).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FatalFetchError);
    expect(err).toMatchObject({ status: 401, body: '{"errors":["Invalid API key"]}' });
    expect(fake.requests).toHaveLength(1);
  });

  it("rejects a page that is not a list of usage records", async () => {
    const fake = createFakeDashboard({ pages: [{ records: [{ unexpected: true }] }] });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    const err = await client.fetchAll(window).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FatalFetchError);
    expect(err).toMatchObject({ status: 200 });
  });

  it("lists the organization's admins", async () => {
    const fake = createFakeDashboard({
      admins: [{ id: "a1", name: "Alice Admin", email: "alice@example.com", orgAccess: "full" }],
    });
    const client = createDashboardClient(testConfig(), { fetchFn: fake.fetchFn, sleep: noSleep });

    expect(await client.listAdmins()).toEqual([
      { id: "a1", name: "Alice Admin", email: "alice@example.com" },
    ]);
    expect(fake.requests[0].path).toBe("/api/v1/organizations/123456/admins");
  });

  it("fails when the organization is unknown", async () => {
    const fake = createFakeDashboard();
    const client = createDashboardClient(testConfig({ ORG_ID: "999" }), {
      fetchFn: fake.fetchFn,
      sleep: noSleep,
    });

    await expect(client.listAdmins()).rejects.toMatchObject({ status: 404 });
  });
});
