import { setTimeout as delay } from "node:timers/promises";
import type { ZodType, ZodTypeDef } from "zod";
import type { Config } from "../config";
import { FatalFetchError } from "../errors";
import type { TimeWindow } from "../window";
import { cursorPastWindow, parseNextLink } from "./pagination";
import { sendWithRetry, type Fetched, type RetryPolicy } from "./retry";
import {
  adminListSchema,
  usagePageSchema,
  type Admin,
  type FetchFn,
  type Sleep,
  type UsageRecord,
} from "./types";

const USER_AGENT = "ApiUsageReport/0.1";

export interface DashboardClientOptions {
  fetchFn?: FetchFn;
  sleep?: Sleep;
}

export interface UsagePage {
  records: UsageRecord[];
}

export interface DashboardClient {
  pages(window: TimeWindow): AsyncGenerator<UsagePage, void, undefined>;
  fetchAll(window: TimeWindow): Promise<UsageRecord[]>;
  listAdmins(): Promise<Admin[]>;
}

export function usageRequestsUrl(config: Config, window: TimeWindow): string {
  const params = new URLSearchParams({
    t0: window.start.toISOString(),
    t1: window.end.toISOString(),
    perPage: String(config.PER_PAGE),
  });
  return `${config.MERAKI_BASE_URL}/organizations/${encodeURIComponent(config.ORG_ID)}/apiRequests?${params}`;
}

// Link targets may be relative to the page that carried them.
function resolveLink(link: string, pageUrl: string, status: number): string {
  try {
    return new URL(link, pageUrl).toString();
  } catch {
    throw new FatalFetchError(pageUrl, status, `Invalid next link: ${link}`);
  }
}

export function createDashboardClient(
  config: Config,
  options: DashboardClientOptions = {},
): DashboardClient {
  const fetchFn: FetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  const sleep: Sleep = options.sleep ?? ((ms) => delay(ms));
  const policy: RetryPolicy = {
    maxAttempts: config.MAX_ATTEMPTS,
    baseDelayMs: config.BACKOFF_BASE_MS,
    maxDelayMs: config.BACKOFF_MAX_MS,
  };

  const headers = {
    Authorization: `Bearer ${config.MERAKI_API_KEY}`,
    Accept: "application/json",
    "User-Agent": USER_AGENT,
  };

  function get(url: string): Promise<Fetched> {
    return sendWithRetry(
      url,
      () =>
        fetchFn(url, {
          headers,
          signal: AbortSignal.timeout(config.REQUEST_TIMEOUT_MS),
        }),
      policy,
      sleep,
    );
  }

  function parseJson<T>(
    url: string,
    { response, body: text }: Fetched,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): T {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new FatalFetchError(url, response.status, `Response is not JSON: ${text.slice(0, 200)}`);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new FatalFetchError(
        url,
        response.status,
        `Unexpected response shape at ${issue.path.join(".") || "<root>"}: ${issue.message}`,
      );
    }
    return parsed.data;
  }

  async function* pages(window: TimeWindow): AsyncGenerator<UsagePage, void, undefined> {
    let url: string | null = usageRequestsUrl(config, window);

    while (url) {
      const fetched = await get(url);
      const records = parseJson(url, fetched, usagePageSchema);
      yield { records };

      if (records.length === 0) return;
      const link = parseNextLink(fetched.response.headers.get("Link"));
      const next: string | null = link === null ? null : resolveLink(link, url, fetched.response.status);
      if (next && cursorPastWindow(next, window.end)) return;
      url = next;
    }
  }

  return {
    pages,

    async fetchAll(window: TimeWindow): Promise<UsageRecord[]> {
      const records: UsageRecord[] = [];
      for await (const page of pages(window)) {
        records.push(...page.records);
      }
      return records;
    },

    async listAdmins(): Promise<Admin[]> {
      const url = `${config.MERAKI_BASE_URL}/organizations/${encodeURIComponent(config.ORG_ID)}/admins`;
      return parseJson(url, await get(url), adminListSchema);
    },
  };
}
