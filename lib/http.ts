/** Collector POST timeout when none is configured. */
export const DEFAULT_POST_TIMEOUT_MS = 5000;

export interface PostJsonOptions {
  timeoutMs?: number;
}

/**
 * POST a JSON body once. Throws on network failure, timeout (AbortError)
 * or any non-2xx status; no retries.
 */
export async function postJson(url: string, body: string, { timeoutMs = DEFAULT_POST_TIMEOUT_MS }: PostJsonOptions = {}): Promise<number> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);
  t.unref();
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal: ctrl.signal,
    });
    // The collector's reply is not used; release the connection either way.
    await res.body?.cancel();
    if (!res.ok) throw new Error(`HTTP ${res.status} ${res.statusText}`);
    return res.status;
  } finally {
    clearTimeout(t);
  }
}
