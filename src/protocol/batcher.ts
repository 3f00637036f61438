/**
 * Outgoing message batching for one connection.
 *
 * Messages accumulate in the current batch until it holds `batchSize`
 * entries or `batchTimeoutMs` has passed since its first entry. A batch that
 * reaches `maxBatchSize` is sealed at once and queued. At most one write is in
 * flight; flushes requested meanwhile run when it completes.
 *
 * @module protocol/batcher
 */

import { epochSeconds, type Clock, type ScheduledTimer } from '../core/clock.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { TimerScope } from '../core/timer-scope.js';
import { LINK_DEFAULTS } from '../link/types.js';
import { encodeFrame } from './framing.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Writes one frame to the socket. Resolves once the bytes are handed off.
 */
export type FrameWriter = (frame: string, messageCount: number) => Promise<void>;

export interface BatcherOptions {
  readonly timers: TimerScope;
  readonly clock: Clock;
  readonly batchSize?: number | undefined;
  readonly batchTimeoutMs?: number | undefined;
  readonly maxBatchSize?: number | undefined;
  readonly maxPendingBatches?: number | undefined;
  readonly logger?: Logger | undefined;
}

export interface BatcherStats {
  readonly framesWritten: number;
  readonly messagesWritten: number;
  readonly messagesDropped: number;
  readonly queued: number;
  readonly inFlight: boolean;
}

// =============================================================================
// OutgoingBatcher
// =============================================================================

export class OutgoingBatcher {
  private current: string[] = [];
  private readonly sealed: string[][] = [];
  private flushTimer: ScheduledTimer | null = null;
  private inFlight = false;
  private flushRequested = false;
  private closed = false;

  private readonly batchSize: number;
  private readonly batchTimeoutMs: number;
  private readonly maxBatchSize: number;
  private readonly maxPendingBatches: number;
  private readonly logger: Logger;

  private framesWritten = 0;
  private messagesWritten = 0;
  private messagesDropped = 0;

  constructor(
    private readonly write: FrameWriter,
    private readonly options: BatcherOptions,
  ) {
    this.batchSize = options.batchSize ?? LINK_DEFAULTS.BATCH_SIZE;
    this.batchTimeoutMs = options.batchTimeoutMs ?? LINK_DEFAULTS.BATCH_TIMEOUT_MS;
    this.maxBatchSize = options.maxBatchSize ?? LINK_DEFAULTS.MAX_BATCH_SIZE;
    this.maxPendingBatches = options.maxPendingBatches ?? LINK_DEFAULTS.MAX_PENDING_BATCHES;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Adds a serialized message (without trailing newline) to the current batch.
   *
   * @returns false once the batcher is closed
   */
  enqueue(serialized: string): boolean {
    if (this.closed) return false;

    this.current.push(serialized);

    if (this.current.length >= this.maxBatchSize) {
      this.seal();
      this.requestFlush();
    } else if (this.current.length >= this.batchSize) {
      this.requestFlush();
    } else if (this.current.length === 1 && this.flushTimer === null) {
      this.flushTimer = this.options.timers.after(this.batchTimeoutMs, () => {
        this.flushTimer = null;
        this.requestFlush();
      });
    }

    return true;
  }

  /**
   * Flushes whatever is queued as soon as no write is in flight.
   */
  flush(): void {
    if (this.closed) return;
    this.requestFlush();
  }

  /**
   * Drops everything still queued and refuses new messages.
   *
   * @returns number of messages discarded
   */
  close(): number {
    if (this.closed) return 0;
    this.closed = true;
    this.cancelTimer();

    const discarded =
      this.current.length + this.sealed.reduce((sum, batch) => sum + batch.length, 0);
    this.current = [];
    this.sealed.length = 0;
    this.messagesDropped += discarded;
    return discarded;
  }

  getStats(): BatcherStats {
    return {
      framesWritten: this.framesWritten,
      messagesWritten: this.messagesWritten,
      messagesDropped: this.messagesDropped,
      queued: this.current.length + this.sealed.reduce((sum, batch) => sum + batch.length, 0),
      inFlight: this.inFlight,
    };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private seal(): void {
    this.cancelTimer();
    if (this.sealed.length >= this.maxPendingBatches) {
      const dropped = this.sealed.shift();
      const count = dropped?.length ?? 0;
      this.messagesDropped += count;
      this.logger.warn('send queue full, dropping oldest batch', { dropped: count });
    }
    this.sealed.push(this.current);
    this.current = [];
  }

  private requestFlush(): void {
    if (this.inFlight) {
      this.flushRequested = true;
      return;
    }
    this.writeNext();
  }

  private writeNext(): void {
    let batch = this.sealed.shift();
    if (batch === undefined) {
      this.cancelTimer();
      batch = this.current;
      this.current = [];
    }
    if (batch.length === 0) return;

    const frame = this.encode(batch);
    const count = batch.length;
    this.inFlight = true;

    void this.write(frame, count).then(
      () => {
        this.framesWritten++;
        this.messagesWritten += count;
        this.afterWrite();
      },
      (err: unknown) => {
        this.messagesDropped += count;
        this.logger.warn('batch write failed', {
          messages: count,
          error: err instanceof Error ? err : String(err),
        });
        this.afterWrite();
      },
    );
  }

  private afterWrite(): void {
    this.inFlight = false;
    if (this.closed) return;

    if (this.sealed.length > 0) {
      this.writeNext();
    } else if (this.flushRequested || this.current.length >= this.batchSize) {
      this.flushRequested = false;
      if (this.current.length > 0) this.writeNext();
    }
  }

  private encode(batch: readonly string[]): string {
    if (batch.length === 1) {
      return `${batch[0]}\n`;
    }
    return encodeFrame({
      type: 'batch',
      messages: batch,
      count: batch.length,
      timestamp: epochSeconds(this.options.clock),
    });
  }

  private cancelTimer(): void {
    if (this.flushTimer) {
      this.flushTimer.cancel();
      this.flushTimer = null;
    }
  }
}
