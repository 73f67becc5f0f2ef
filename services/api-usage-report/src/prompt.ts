import type { Interface } from "node:readline/promises";
import { MAX_WINDOW_DAYS, parseDays } from "./window";

export type Ask = (question: string) => Promise<string>;

const QUESTION = `Enter timespan (in days) to retrieve API usage [1-${MAX_WINDOW_DAYS}] (1): `;

/**
 * Ask for the window length until the answer is usable.
 */
export async function promptForDays(
  ask: Ask,
  print: (line: string) => void = console.log,
): Promise<number> {
  for (;;) {
    const answer = await ask(QUESTION);
    const days = parseDays(answer);
    if (days !== null) return days;
    print(`Please enter a whole number of days between 1 and ${MAX_WINDOW_DAYS}.`);
  }
}

/**
 * Adapt a readline interface to `Ask`. Once input ends, pending and later
 * questions reject with "no input" instead of waiting forever.
 */
export function askFromReadline(rl: Interface): Ask {
  const closed = new AbortController();
  rl.once("close", () => closed.abort());

  return async (question) => {
    if (closed.signal.aborted) throw new Error("no input");
    try {
      return await rl.question(question, { signal: closed.signal });
    } catch (err) {
      if (closed.signal.aborted) throw new Error("no input");
      throw err;
    }
  };
}
