import { z } from "zod";
import { ConfigurationError } from "./errors";

export const ENDPOINT_KEY_POLICIES = ["template", "raw"] as const;
export type EndpointKeyPolicy = (typeof ENDPOINT_KEY_POLICIES)[number];

const configSchema = z.object({
  MERAKI_API_KEY: z
    .string({ required_error: "MERAKI_API_KEY is required" })
    .trim()
    .min(1, "MERAKI_API_KEY is required"),
  ORG_ID: z
    .string({ required_error: "ORG_ID is required" })
    .trim()
    .min(1, "ORG_ID is required"),
  MERAKI_BASE_URL: z.string().url().default("https://api.meraki.com/api/v1"),
  PER_PAGE: z.coerce.number().int().min(3).max(1000).default(1000),
  MAX_ATTEMPTS: z.coerce.number().int().min(1).max(25).default(5),
  BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  BACKOFF_MAX_MS: z.coerce.number().int().nonnegative().default(30_000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  OUTPUT_DIR: z.string().min(1).default("."),
  ENDPOINT_KEYS: z.enum(ENDPOINT_KEY_POLICIES).default("template"),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Build the run configuration from an environment map. Called once at startup;
 * the result is passed explicitly to everything that needs it.
 */
export function loadConfig(env: Record<string, string | undefined>): Config {
  const result = configSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) =>
        issue.message.startsWith(String(issue.path[0]))
          ? issue.message
          : `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  return {
    ...result.data,
    MERAKI_BASE_URL: result.data.MERAKI_BASE_URL.replace(/\/+$/, ""),
  };
}
