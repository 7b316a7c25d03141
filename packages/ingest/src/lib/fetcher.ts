import { RETRYABLE_STATUSES } from "../config/sources";
import { createLogger, describeError } from "./log";
import type { RetrySettings } from "./settings";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
  ) {
    super(`Fetch failed (${status})`);
    this.name = "HttpStatusError";
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly phase: "connect" | "read",
    readonly timeoutMs: number,
  ) {
    super(`${phase} timeout after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class DocumentFetchError extends Error {
  constructor(
    readonly url: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(`Giving up on ${url} after ${attempts} attempt(s): ${describeError(lastError)}`);
    this.name = "DocumentFetchError";
  }
}

const log = createLogger("fetch");

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const fetchText = async (
  url: string,
  options: { timeoutMs?: number; headers?: Record<string, string>; fetchImpl?: FetchLike } = {},
) => {
  const { timeoutMs = 10000, headers = {}, fetchImpl = fetch } = options;
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, {
      signal: controller.signal,
      headers,
    });

    if (!response.ok) {
      throw new HttpStatusError(response.status, url);
    }

    return await response.text();
  } finally {
    clearTimeout(timeout);
  }
};

export type DownloadOptions = RetrySettings & {
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
  wait?: (ms: number) => Promise<void>;
};

export type DownloadResult = {
  body: Buffer;
  attempts: number;
};

// The connect timer covers the wait for response headers, the read timer covers the body.
const downloadOnce = async (url: string, options: DownloadOptions) => {
  const { headers = {}, fetchImpl = fetch } = options;
  const controller = new AbortController();
  let phase: TimeoutError["phase"] = "connect";
  let timer = setTimeout(() => controller.abort(), options.connectTimeoutMs);

  try {
    const response = await fetchImpl(url, { signal: controller.signal, headers });
    clearTimeout(timer);
    if (!response.ok) {
      throw new HttpStatusError(response.status, url);
    }

    phase = "read";
    timer = setTimeout(() => controller.abort(), options.readTimeoutMs);
    return Buffer.from(await response.arrayBuffer());
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutError(phase, phase === "connect" ? options.connectTimeoutMs : options.readTimeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
};

export const isRetryable = (error: unknown) => {
  if (error instanceof HttpStatusError) {
    return RETRYABLE_STATUSES.has(error.status);
  }
  return true;
};

export const fetchBufferWithRetry = async (url: string, options: DownloadOptions): Promise<DownloadResult> => {
  const wait = options.wait ?? sleep;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown = null;
  let made = 0;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    made = attempt;
    try {
      const body = await downloadOnce(url, options);
      return { body, attempts: attempt };
    } catch (error) {
      lastError = error;
      if (!isRetryable(error) || attempt === attempts) {
        break;
      }
      const delay = options.backoffMs * 2 ** (attempt - 1);
      log.warn(`${describeError(error)} on attempt ${attempt}/${attempts}; retrying in ${delay}ms`);
      await wait(delay);
    }
  }

  throw new DocumentFetchError(url, made, lastError);
};
