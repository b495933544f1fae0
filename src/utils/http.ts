// CHANGE: Provide a retrying JSON POST helper for outbound signals.
// WHY: The rebuild hook may be briefly unavailable; 5xx and network errors are retried with backoff.

import axios, { AxiosError, AxiosInstance } from "axios";
import { debug } from "../logger.js";

const RETRY_ATTEMPTS = 3;
const RETRY_BASE_DELAY_MS = 500;

const httpClient: AxiosInstance = axios.create({
  maxRedirects: 5,
  headers: {
    "User-Agent": "mirror-vuln-gate/1.0",
    Accept: "application/json"
  }
});

export function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

function retryDelay(error: AxiosError, attempt: number): number | null {
  const status = error.response?.status;
  if (status === 429) {
    const header = error.response?.headers["retry-after"];
    const seconds = typeof header === "string" ? Number.parseFloat(header) : Number.NaN;
    return Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : RETRY_BASE_DELAY_MS * 2 ** attempt;
  }
  const isNetworkIssue = error.code === "ECONNRESET" || error.code === "ETIMEDOUT" || error.code === "ECONNABORTED";
  const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
  return isNetworkIssue || isRetryableStatus ? RETRY_BASE_DELAY_MS * 2 ** attempt : null;
}

/**
 * POST a JSON payload, retrying transient failures up to three attempts.
 *
 * @returns Response status code.
 */
export async function postJson(url: string, payload: unknown, timeoutMs: number): Promise<number> {
  for (let attempt = 0; ; attempt += 1) {
    try {
      const response = await httpClient.post(url, payload, { timeout: timeoutMs });
      return response.status;
    } catch (rawError) {
      if (!axios.isAxiosError(rawError) || attempt + 1 >= RETRY_ATTEMPTS) {
        throw rawError;
      }
      const delay = retryDelay(rawError, attempt);
      if (delay === null) {
        throw rawError;
      }
      debug(`HTTP retry (${attempt + 2}/${RETRY_ATTEMPTS}) after ${delay}ms for ${url}`);
      await sleep(delay);
    }
  }
}

export { httpClient };
