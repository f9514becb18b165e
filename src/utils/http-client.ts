export const DEFAULT_FETCH_HEADERS = { 'User-Agent': 'PrecipEvents/1.0 (hourly precipitation analytics)' };

export type FetchWithTimeout = (url: string, options?: RequestInit, timeoutMs?: number) => Promise<Response>;

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: typeof fetch = globalThis.fetch.bind(globalThis)): FetchWithTimeout =>
  async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      return await fetchImpl(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  };
