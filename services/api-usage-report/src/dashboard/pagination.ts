const LINK_PART = /<([^>]*)>\s*((?:;\s*[^;,]*)*)/g;
const REL_PARAM = /;\s*rel\s*=\s*"?([^";]+)"?/i;

/**
 * Extract the `rel=next` target of an RFC 8288 Link header.
 */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  for (const match of header.matchAll(LINK_PART)) {
    const rel = REL_PARAM.exec(match[2]);
    if (rel && rel[1].split(/\s+/).includes("next")) {
      return match[1];
    }
  }
  return null;
}

/**
 * True when the next page would start at or after the end of the window.
 * Only cursors that are timestamps can tell; opaque tokens never do.
 */
export function cursorPastWindow(nextUrl: string, windowEnd: Date): boolean {
  let cursor: string | null;
  try {
    cursor = new URL(nextUrl).searchParams.get("startingAfter");
  } catch {
    return false;
  }
  if (!cursor || !/^\d{4}-\d{2}-\d{2}T/.test(cursor)) return false;
  const at = Date.parse(cursor);
  return !Number.isNaN(at) && at >= windowEnd.getTime();
}
