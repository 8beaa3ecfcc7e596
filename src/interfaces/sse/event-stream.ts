import type { StreamItem, Subscription } from '../../application/event-bus.js';

/** Server-sent-events framing for one stream item; null for `closed`. */
export function formatStreamItem(item: StreamItem): string | null {
  switch (item.kind) {
    case 'event':
      return `event: ${item.event.type}\ndata: ${JSON.stringify(item.event.payload)}\n\n`;
    case 'warning':
      return `event: warning\ndata: ${JSON.stringify({ missed: item.missed })}\n\n`;
    case 'heartbeat':
      return ':\n\n';
    case 'closed':
      return null;
  }
}

export interface StreamWriter {
  /** Returns false when the underlying buffer is full. */
  write(chunk: string): boolean;
  /** Resolves when the writer can take more, or the peer went away. */
  drained(): Promise<void>;
}

/** The parts of an HTTP response a stream writer needs. */
export interface DrainableTarget {
  write(chunk: string): boolean;
  on(event: 'drain' | 'close', listener: () => void): unknown;
  off(event: 'drain' | 'close', listener: () => void): unknown;
}

/**
 * Wraps a response. Each wait detaches both of its listeners once either
 * fires, so repeated backpressure does not pile up listeners.
 */
export function streamWriterFor(target: DrainableTarget): StreamWriter {
  return {
    write: (chunk) => target.write(chunk),
    drained: () =>
      new Promise<void>((resolve) => {
        const done = () => {
          target.off('drain', done);
          target.off('close', done);
          resolve();
        };
        target.on('drain', done);
        target.on('close', done);
      }),
  };
}

/**
 * Copies a subscription onto a writer until the subscription closes.
 * Waits for drain when the writer pushes back.
 */
export async function pumpSubscription(subscription: Subscription, writer: StreamWriter): Promise<number> {
  let written = 0;
  for (;;) {
    const item = await subscription.next();
    const frame = formatStreamItem(item);
    if (frame === null) return written;

    written += 1;
    if (!writer.write(frame)) {
      await writer.drained();
    }
  }
}
