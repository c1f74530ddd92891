export interface JsonRequestOptions {
  serviceName: string;
  fetchImpl: typeof fetch;
  requestTimeoutMs: number;
  init?: RequestInit;
}

export function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

export function assertPositiveInt(value: number, fieldName: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${fieldName} must be a positive integer`);
  }
}

/**
 * GET/POST with an abort-based timeout. Non-2xx responses and timeouts
 * become errors naming the service.
 */
export async function requestJson(url: URL, options: JsonRequestOptions): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, options.requestTimeoutMs);

  try {
    const response = await options.fetchImpl(url, {
      ...options.init,
      signal: controller.signal
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`${options.serviceName} request failed (${response.status}): ${body}`);
    }

    const payload: unknown = await response.json();
    return payload;
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      throw new Error(
        `${options.serviceName} request timed out after ${options.requestTimeoutMs}ms`
      );
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
