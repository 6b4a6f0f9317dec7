/**
 * Response bodies that misbehave after the headers have arrived.
 */

/** Sends one chunk and then never closes. */
export function stalledBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"members": ['));
    },
  });
}

/** Fails on the first read, like a connection reset mid-body. */
export function failingBody(message = 'terminated'): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.error(new TypeError(message));
    },
  });
}
