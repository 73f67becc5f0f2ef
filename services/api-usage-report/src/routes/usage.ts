import { Hono } from "hono";
import { rankEntries } from "../aggregation/frequency";
import type { Config } from "../config";
import { FatalFetchError, TransientFetchError } from "../errors";
import { collectUsage, type RunDependencies } from "../run";
import { DEFAULT_WINDOW_DAYS, parseDays } from "../window";

export function createUsageRoute(config: Config, deps: RunDependencies = {}): Hono {
  const usageRoute = new Hono();

  /**
   * GET /usage/report
   * Fetch and aggregate the organization's API requests. Supports ?days=1..31.
   */
  usageRoute.get("/usage/report", async (c) => {
    const days = parseDays(c.req.query("days") ?? String(DEFAULT_WINDOW_DAYS));
    if (days === null) {
      return c.json({ error: "days must be a whole number between 1 and 31" }, 400);
    }

    try {
      const { window, report } = await collectUsage(config, days, {
        print: () => undefined,
        ...deps,
      });
      return c.json({
        window: {
          days: window.days,
          start: window.start.toISOString(),
          end: window.end.toISOString(),
        },
        total: report.total,
        methods: rankEntries(report.methods),
        statuses: rankEntries(report.statuses),
        endpoints: rankEntries(report.endpoints),
      });
    } catch (err) {
      console.error("Usage report failed:", err);
      if (err instanceof FatalFetchError) {
        return c.json({ error: err.message }, 502);
      }
      if (err instanceof TransientFetchError) {
        return c.json({ error: err.message }, 503);
      }
      throw err;
    }
  });

  return usageRoute;
}
