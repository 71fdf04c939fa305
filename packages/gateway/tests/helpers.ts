import { vi } from "vitest";
import { ManualClock } from "@quire/types";
import type { FetchFn } from "../src/http.js";
import { signCardPayload } from "../src/providers/card.js";

export const CARD_SECRET = "test-secret";
export const MOMO_A_TOKEN = "test-token";

export function testClock(): ManualClock {
  return new ManualClock("2026-01-10T12:00:00.000Z");
}

export interface MockResponse {
  readonly status: number;
  readonly body?: unknown;
  readonly error?: Error;
}

/**
 * fetch stand-in answering from a script, one entry per call.
 */
export function createMockFetch(responses: readonly MockResponse[]) {
  let callIndex = 0;
  return vi.fn<FetchFn>(async () => {
    const config = responses[callIndex];
    callIndex++;
    if (config === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${callIndex})`);
    }
    if (config.error !== undefined) {
      throw config.error;
    }
    const body = config.body !== undefined ? JSON.stringify(config.body) : "";
    return new Response(body, { status: config.status });
  });
}

/** fetch stand-in that never answers until aborted. */
export const hangingFetch: FetchFn = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => {
      const err = new Error("The operation was aborted");
      err.name = "AbortError";
      reject(err);
    });
  });

// ─── Card webhooks ───────────────────────────────────────────────────────

export function cardWebhook(
  type: string,
  object: Record<string, unknown> = {},
  created = Date.parse("2026-01-10T11:59:00.000Z") / 1000,
): string {
  return JSON.stringify({
    id: "evt_1",
    type,
    created,
    data: {
      object: {
        id: "ch_1",
        amount: 1000,
        currency: "eur",
        reference: "inv-1:1",
        metadata: { authorRef: "author-1" },
        ...object,
      },
    },
  });
}

export function cardSignature(raw: string, clock: ManualClock, secret = CARD_SECRET): string {
  const t = String(Math.floor(clock.now().getTime() / 1000));
  return `t=${t},v1=${signCardPayload(secret, t, raw)}`;
}
