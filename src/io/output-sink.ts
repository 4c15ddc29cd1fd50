/**
 * Output sinks for scan results.
 *
 * A sink reports `'closed'` once its consumer has gone away (EPIPE on a
 * pipe, a destroyed stream). That is a normal way for a scan to end, as
 * with `gap-detect data.csv | head -n 1`, and is kept apart from real
 * write failures, which are rethrown.
 *
 * @module io/output-sink
 */

import type { Writable } from 'node:stream';

export type SinkStatus = 'open' | 'closed';

export interface OutputSink {
  write(chunk: string): Promise<SinkStatus>;
}

/**
 * Sink over a writable stream (typically process.stdout).
 *
 * Waits for 'drain' when the stream buffer is full.
 */
export class StreamSink implements OutputSink {
  private closed = false;
  private failure: Error | null = null;

  constructor(private readonly stream: Writable) {
    stream.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EPIPE' || err.code === 'ERR_STREAM_DESTROYED') {
        this.closed = true;
      } else {
        this.failure = err;
      }
    });
    stream.on('close', () => {
      this.closed = true;
    });
  }

  async write(chunk: string): Promise<SinkStatus> {
    if (this.failure) throw this.failure;
    if (this.closed || this.stream.destroyed || this.stream.writableEnded) {
      this.closed = true;
      return 'closed';
    }

    if (!this.stream.write(chunk)) {
      await this.waitForDrain();
    }

    if (this.failure) throw this.failure;
    return this.closed ? 'closed' : 'open';
  }

  private waitForDrain(): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        this.stream.off('drain', done);
        this.stream.off('close', done);
        this.stream.off('error', done);
        resolve();
      };
      this.stream.once('drain', done);
      this.stream.once('close', done);
      this.stream.once('error', done);
    });
  }
}

/**
 * In-memory sink, optionally closing after a number of writes.
 */
export class MemorySink implements OutputSink {
  readonly chunks: string[] = [];

  constructor(private readonly closeAfter: number = Infinity) {}

  async write(chunk: string): Promise<SinkStatus> {
    if (this.chunks.length >= this.closeAfter) return 'closed';
    this.chunks.push(chunk);
    return this.chunks.length >= this.closeAfter ? 'closed' : 'open';
  }

  get text(): string {
    return this.chunks.join('');
  }
}
