import { SizeExceededError, TransportError } from "./errors.js";

export const MAX_RESPONSE_BYTES = 1024 * 1024;
export const BROWSER_USER_AGENT = "Mozilla/5.0";

export interface HttpClient {
  get(url: string, headers?: Record<string, string>): Promise<string>;
}

export async function readCappedBody(res: Response, maxBytes = MAX_RESPONSE_BYTES): Promise<string> {
  if (!res.body) return "";
  const reader = res.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new SizeExceededError(maxBytes);
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/**
 * GET-only client over the global fetch. Each request gets its own deadline,
 * which also covers reading the body.
 */
export class FetchHttpClient implements HttpClient {
  constructor(
    private timeoutMs: number,
    private maxBytes = MAX_RESPONSE_BYTES,
  ) {}

  async get(url: string, headers: Record<string, string> = {}): Promise<string> {
    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), this.timeoutMs);
    try {
      let res: Response;
      try {
        res = await fetch(url, { method: "GET", headers, signal: ac.signal });
      } catch (err) {
        const reason = ac.signal.aborted ? `timeout after ${this.timeoutMs}ms` : "request failed";
        throw new TransportError(reason, { cause: err });
      }
      if (!res.ok) {
        await res.body?.cancel();
        throw new TransportError(`http status ${res.status}`);
      }
      try {
        return await readCappedBody(res, this.maxBytes);
      } catch (err) {
        if (err instanceof TransportError) throw err;
        throw new TransportError("read response failed", { cause: err });
      }
    } finally {
      clearTimeout(timer);
    }
  }
}
