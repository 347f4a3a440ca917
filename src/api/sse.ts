/** The part of a raw HTTP response an SSE stream writes to. */
export interface SseSink {
  readonly destroyed: boolean;
  write(chunk: string): boolean;
  once(event: 'close', listener: () => void): unknown;
  removeListener(event: 'close', listener: () => void): unknown;
}

export function formatSseEvent(payload: unknown): string {
  return `data: ${JSON.stringify(payload)}\n\n`;
}

/**
 * Writes one `data:` event per item. Resolves to false when the client
 * went away; iteration then stops and the source generator is returned,
 * so no further work is started for a closed socket.
 */
export async function pipeSse<T>(
  sink: SseSink,
  events: AsyncIterable<T>,
  toPayload: (event: T) => unknown,
): Promise<boolean> {
  let closed = sink.destroyed;
  const onClose = () => {
    closed = true;
  };
  sink.once('close', onClose);

  try {
    if (closed) return false;
    for await (const event of events) {
      if (closed) return false;
      sink.write(formatSseEvent(toPayload(event)));
    }
    return !closed;
  } finally {
    sink.removeListener('close', onClose);
  }
}
