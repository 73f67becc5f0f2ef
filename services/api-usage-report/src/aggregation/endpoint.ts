import type { EndpointKeyPolicy } from "../config";

/**
 * Path segments that identify a specific resource rather than an operation:
 * organization ids, network and config template ids (L_/N_/G_ prefixed),
 * device serials, and UUIDs.
 */
const IDENTIFIER_SEGMENTS: RegExp[] = [
  /^\d+$/,
  /^[A-Z]_\d+$/,
  /^[A-Z0-9]{4}-[A-Z0-9]{4}-[A-Z0-9]{4}$/,
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i,
];

export function endpointKey(path: string, policy: EndpointKeyPolicy): string {
  if (policy === "raw") return path;

  const [bare] = path.split("?");
  return bare
    .split("/")
    .map((segment) =>
      IDENTIFIER_SEGMENTS.some((pattern) => pattern.test(segment)) ? ":id" : segment,
    )
    .join("/");
}
