import { fetch } from "undici";
import type { Logger } from "pino";

import { CircuitBreaker } from "./circuitBreaker.js";
import { CircuitOpenError, CrmHttpError, CrmNetworkError, CrmTimeoutError, isRetryable } from "./errors.js";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 1000, maxDelayMs: 10_000 };

export interface CrmClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  retry?: RetryPolicy;
  breaker?: CircuitBreaker;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface ListOptions {
  limit?: number;
  page?: number;
  fields?: string[];
  columns?: Record<string, unknown>;
}

export function crmBaseUrl(tenant: string): string {
  return `https://${tenant}.impulsecrm.ru/api`;
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

function parsePossiblyJson(text: string): unknown {
  if (text.trim() === "") {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

function extractItems(payload: unknown): unknown[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  if (payload && typeof payload === "object" && "data" in payload && Array.isArray(payload.data)) {
    return payload.data;
  }
  return [];
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Thin HTTP client for the scheduling CRM. Every call passes through the
 * breaker and the retry loop; one breaker failure is recorded per call after
 * its retries are exhausted.
 */
export class CrmClient {
  readonly breaker: CircuitBreaker;

  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  constructor(options: CrmClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${options.apiKey}:`).toString("base64")}`;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.breaker = options.breaker ?? new CircuitBreaker();
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
  }

  async list(entity: string, options: ListOptions = {}): Promise<unknown[]> {
    const payload = await this.request(`/${entity}/list`, {
      limit: options.limit ?? 100,
      page: options.page ?? 1,
      ...(options.fields ? { fields: options.fields } : {}),
      ...(options.columns ? { columns: options.columns } : {})
    });
    return extractItems(payload);
  }

  /** Creates a record, or updates it when `data.id` is set. */
  async update(entity: string, data: Record<string, unknown>): Promise<unknown> {
    return this.request(`/${entity}/update`, data);
  }

  async remove(entity: string, id: number): Promise<unknown> {
    return this.request(`/${entity}/delete`, { id });
  }

  private async request(path: string, body?: unknown): Promise<unknown> {
    if (!this.breaker.canAttempt()) {
      throw new CircuitOpenError();
    }

    for (let attempt = 1; ; attempt += 1) {
      try {
        const result = await this.send(path, body);
        this.breaker.recordSuccess();
        return result;
      } catch (err) {
        if (!isRetryable(err)) {
          // A 4xx is an answer from a healthy CRM.
          if (err instanceof CrmHttpError) {
            this.breaker.recordSuccess();
          } else {
            this.breaker.recordFailure();
          }
          throw err;
        }

        if (attempt >= this.retry.attempts) {
          this.breaker.recordFailure();
          this.logger?.warn(
            { path, attempts: attempt, breaker: this.breaker.currentState, err_message: err instanceof Error ? err.message : String(err) },
            "crm request failed after retries"
          );
          throw err;
        }

        const delay = backoffDelay(attempt, this.retry);
        this.logger?.debug({ path, attempt, delay_ms: delay }, "crm request retry");
        await this.sleep(delay);
      }
    }
  }

  private async send(path: string, body?: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let text: string;
    let status: number;
    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          Authorization: this.authorization,
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        body: JSON.stringify(body ?? {}),
        signal: controller.signal
      });
      status = response.status;
      text = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new CrmTimeoutError(this.timeoutMs);
      }
      throw new CrmNetworkError(err instanceof Error ? err.message : String(err));
    } finally {
      clearTimeout(timeout);
    }

    if (status < 200 || status >= 300) {
      throw new CrmHttpError(status, text);
    }
    return parsePossiblyJson(text);
  }
}
