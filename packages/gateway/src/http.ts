/**
 * @quire/gateway — HTTP transport for provider APIs.
 *
 * Wraps an injected fetch() with:
 * - Bearer / API key header injection
 * - Request timeout via AbortController
 * - Failure classification into ProviderError
 *
 * No retries here: the ChargeExecutor owns the retry budget.
 * 2xx and 4xx responses are returned for the provider to interpret
 * (a 402 is a decline, not a transport failure).
 */

import { ProviderError } from "@quire/types";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ProviderHttpConfig {
  readonly provider: string;
  readonly baseUrl: string;
  /** Header name → value added to every request */
  readonly headers?: Readonly<Record<string, string>>;
  /** Default: 15000 */
  readonly timeoutMs?: number;
  /** Default: globalThis.fetch */
  readonly fetchFn?: FetchFn;
}

export interface ProviderResponse {
  readonly status: number;
  readonly body: unknown;
}

/**
 * Parse a response body as JSON. Empty bodies become `{}`, non-JSON
 * bodies `{ raw }`.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return { raw: text };
  }
}

export class ProviderHttpClient {
  private readonly provider: string;
  private readonly baseUrl: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(config: ProviderHttpConfig) {
    this.provider = config.provider;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.headers = config.headers ?? {};
    this.timeoutMs = config.timeoutMs ?? 15000;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  async get(path: string, headers?: Readonly<Record<string, string>>): Promise<ProviderResponse> {
    return this.request("GET", path, undefined, headers);
  }

  async post(
    path: string,
    body: unknown,
    headers?: Readonly<Record<string, string>>,
  ): Promise<ProviderResponse> {
    return this.request("POST", path, body, headers);
  }

  private async request(
    method: string,
    path: string,
    body: unknown,
    extraHeaders: Readonly<Record<string, string>> | undefined,
  ): Promise<ProviderResponse> {
    const init: RequestInit = {
      method,
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...this.headers,
        ...extraHeaders,
      },
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const response = await this.fetchWithTimeout(`${this.baseUrl}${path}`, init);
    const responseBody = await parseResponseBody(response);

    if (response.status >= 500) {
      throw new ProviderError(this.provider, "transient", `HTTP ${response.status}`);
    }

    return { status: response.status, body: responseBody };
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new ProviderError(this.provider, "transient", `timed out after ${this.timeoutMs}ms`);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderError(this.provider, "transient", `network error: ${reason}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
