/**
 * Thin wrapper over the global fetch with a hard timeout.
 */

export interface FetchOptions extends RequestInit {
  /** Abort the request after this many milliseconds, body read included. */
  timeoutMs: number;
}

/** A response whose body has already been read as text. */
export interface TextResponse {
  status: number;
  ok: boolean;
  body: string;
}

/**
 * Fetch a URL and read its body as text, failing when the timeout elapses
 * before the body is complete.
 * Non-2xx responses are returned as-is; callers decide what is an error.
 */
export async function fetchText(url: string, options: FetchOptions): Promise<TextResponse> {
  const { timeoutMs, ...init } = options;
  const controller = new AbortController();
  const timedOut = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(new Error(`request timed out after ${timeoutMs}ms`)),
      { once: true }
    );
  });
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await Promise.race([fetch(url, { ...init, signal: controller.signal }), timedOut]);
    const body = await Promise.race([response.text(), timedOut]);
    return { status: response.status, ok: response.ok, body };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Shorten an error body so it is safe to put in a message.
 */
export function truncateBody(text: string, max = 200): string {
  return text.length > max ? text.substring(0, max) + '...' : text;
}
