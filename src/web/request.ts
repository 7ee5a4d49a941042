// pattern: Imperative Shell

import { ProviderError } from "./types.js";
import type { ProviderName } from "./types.js";

export const DEFAULT_PROVIDER_TIMEOUT_MS = 10000;

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

function toProviderError(provider: ProviderName, error: unknown, timeoutMs: number): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  if (isTimeout(error)) {
    return new ProviderError("timeout", provider, `${provider} timed out after ${timeoutMs}ms`);
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new ProviderError("network", provider, `${provider} request failed: ${detail}`);
}

/**
 * Issue one outbound provider request and read its body, bounded by a single timeout
 * that covers both the response headers and the body.
 */
export async function fetchProviderText(
  provider: ProviderName,
  url: string | URL,
  init: RequestInit,
  timeoutMs: number = DEFAULT_PROVIDER_TIMEOUT_MS
): Promise<string> {
  try {
    const response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });

    if (!response.ok) {
      throw new ProviderError("http", provider, `${provider} returned status ${response.status}`);
    }

    return await response.text();
  } catch (error) {
    throw toProviderError(provider, error, timeoutMs);
  }
}
