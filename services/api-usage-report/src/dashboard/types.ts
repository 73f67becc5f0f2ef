import { z } from "zod";

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

/**
 * One entry of `GET /organizations/{organizationId}/apiRequests`.
 */
export const usageRecordSchema = z.object({
  ts: z.string(),
  adminId: text,
  method: z.string(),
  host: text,
  path: z.string(),
  queryString: text,
  userAgent: text,
  sourceIp: text,
  responseCode: z.number().int(),
  latencyMs: z
    .number()
    .nullish()
    .transform((value) => value ?? null),
  operationId: text,
  version: z
    .number()
    .nullish()
    .transform((value) => value ?? null),
});

export const usagePageSchema = z.array(usageRecordSchema);

export const adminSchema = z.object({
  id: z.string(),
  name: text,
  email: text,
});

export const adminListSchema = z.array(adminSchema);

export type UsageRecord = z.infer<typeof usageRecordSchema>;
export type Admin = z.infer<typeof adminSchema>;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;
