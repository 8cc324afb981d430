/**
 * Sync API Client
 *
 * Talks to the history service over HTTPS with a bearer token.
 * Two operations: list the conversations the server already holds
 * (with their content hashes) and upload a batch of new messages.
 *
 * @example
 * ```typescript
 * const client = createApiClient({
 *   endpoint: config.apiEndpoint,
 *   machineId: config.machineId,
 *   getToken: createCredentialProvider({ store, env: process.env }),
 * });
 *
 * const { conversations } = await client.listConversations(signal);
 * ```
 */

import { z } from "zod";

// --- Wire Types ---

export const ApiMessageSchema = z.object({
  uuid: z.string(),
  timestamp: z.string(),
  role: z.string(),
  content: z.string(),
  model: z.string().optional(),
  tokens: z.number().int().optional(),
});

export type ApiMessage = z.infer<typeof ApiMessageSchema>;

export interface SyncRequest {
  machineId: string;
  sessionId: string;
  projectPath: string;
  messages: ApiMessage[];
  timestamp: string;
}

export const SyncResponseSchema = z.object({
  success: z.boolean(),
  processed: z.number().int(),
  sessionId: z.string().default(""),
});

export type SyncResponse = z.infer<typeof SyncResponseSchema>;

export const ConversationSchema = z.object({
  sessionId: z.string(),
  hash: z.string().default(""),
  date: z.string().default(""),
});

export type Conversation = z.infer<typeof ConversationSchema>;

export const ConversationsListResponseSchema = z.object({
  conversations: z.array(ConversationSchema).nullish().transform((list) => list ?? []),
  total: z.number().int().default(0),
});

export type ConversationsListResponse = z.infer<typeof ConversationsListResponseSchema>;

// --- Errors ---

export class HttpError extends Error {
  readonly statusCode: number;
  readonly body: string;

  constructor(statusCode: number, body: string) {
    super(`HTTP ${statusCode}: ${body}`);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.body = body;
  }

  get retryable(): boolean {
    return this.statusCode === 429 || this.statusCode >= 500;
  }
}

// --- Client ---

export type TokenProvider = () => Promise<string>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ApiClientOptions {
  endpoint: string;
  machineId: string;
  getToken: TokenProvider;
  fetch?: typeof fetch;
  /** Retries after the first attempt */
  maxRetries?: number;
  /** Per-attempt timeout */
  timeoutMs?: number;
  sleep?: Sleep;
}

export interface ApiClient {
  listConversations: (signal?: AbortSignal) => Promise<ConversationsListResponse>;
  sync: (request: SyncRequest, signal?: AbortSignal) => Promise<SyncResponse>;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 30_000;
const BASE_BACKOFF_MS = 1000;

function abortReason(signal: AbortSignal): unknown {
  if (signal.reason !== undefined) return signal.reason;
  const err = new Error("This operation was aborted");
  err.name = "AbortError";
  return err;
}

/**
 * setTimeout that rejects as soon as the signal fires.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * 1s, 2s, 4s, ...
 */
export function backoffMs(attempt: number): number {
  return BASE_BACKOFF_MS * Math.pow(2, attempt - 1);
}

/**
 * Create a client bound to one endpoint and machine
 */
export function createApiClient(options: ApiClientOptions): ApiClient {
  const {
    endpoint,
    machineId,
    getToken,
    maxRetries = DEFAULT_MAX_RETRIES,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    sleep = abortableSleep,
  } = options;
  const doFetch = options.fetch ?? fetch;
  const baseUrl = endpoint.replace(/\/+$/, "");

  async function doRequest(
    method: string,
    path: string,
    body: unknown,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    const token = await getToken();

    const timeout = AbortSignal.timeout(timeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    const init: RequestInit = {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        "X-Machine-ID": machineId,
        "Content-Type": "application/json",
      },
      signal: requestSignal,
    };
    if (body !== undefined && method !== "GET") {
      init.body = JSON.stringify(body);
    }

    const response = await doFetch(`${baseUrl}${path}`, init);
    const text = await response.text();

    if (!response.ok) {
      throw new HttpError(response.status, text);
    }
    if (text === "") return null;

    try {
      return JSON.parse(text) as unknown;
    } catch (err) {
      throw new Error(`parsing response: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  /**
   * Retry only on 429 and 5xx. Anything else is returned to the caller at once.
   */
  async function doWithRetry(
    method: string,
    path: string,
    body: unknown,
    signal: AbortSignal | undefined
  ): Promise<unknown> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        await sleep(backoffMs(attempt), signal);
      }

      try {
        return await doRequest(method, path, body, signal);
      } catch (err) {
        lastError = err;
        if (err instanceof HttpError && err.retryable) {
          console.warn(`[api] ${method} ${path} failed (${err.statusCode}), attempt ${attempt + 1}/${maxRetries + 1}`);
          continue;
        }
        throw err;
      }
    }

    throw new Error(
      `max retries exceeded: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
      { cause: lastError }
    );
  }

  async function listConversations(signal?: AbortSignal): Promise<ConversationsListResponse> {
    const data = await doWithRetry("GET", "/conversations", undefined, signal);
    const parsed = ConversationsListResponseSchema.safeParse(data ?? {});
    if (!parsed.success) {
      throw new Error(`invalid conversations response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async function sync(request: SyncRequest, signal?: AbortSignal): Promise<SyncResponse> {
    const data = await doWithRetry("POST", "/sync", request, signal);
    const parsed = SyncResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`invalid sync response: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  return { listConversations, sync };
}
