import type { ByteSink } from './byte-sink.js';
import { DEFAULT_MAX_QUEUED_BYTES } from '@gridrelay/protocol';

/**
 * The parts of a writable stream the pump uses
 */
export interface WritableTarget {
  write(chunk: string): boolean;
  on(event: 'drain' | 'close' | 'error', listener: () => void): unknown;
  removeListener(event: 'drain' | 'close' | 'error', listener: () => void): unknown;
}

/**
 * OutputPump - backpressure-aware byte sink over a writable stream
 *
 * stream.write() returns false once the peer's buffer is full. The pump queues
 * chunks until 'drain' and stops writing for good on 'close' or 'error'.
 *
 * Encoder output is incremental (each chunk assumes the ones before it
 * arrived), so queued chunks are never dropped on their own. When the backlog
 * passes maxQueuedBytes the pump flags an overflow; the owner discards the
 * backlog with takeOverflow() and follows with a full redraw.
 */
export class OutputPump implements ByteSink {
  private stream: WritableTarget;
  private queue: string[] = [];
  private queuedBytes = 0;
  private writing = false;
  private waitingForDrain = false;
  private destroyed = false;
  private overflowed = false;

  private maxQueuedBytes: number;

  // Metrics
  private droppedChunks = 0;
  private overflowCount = 0;
  private drainCount = 0;
  private totalBytesWritten = 0;
  private totalChunksWritten = 0;
  private peakQueuedBytes = 0;

  // Event handlers (stored for cleanup)
  private drainHandler: () => void;
  private closeHandler: () => void;
  private errorHandler: () => void;

  constructor(stream: WritableTarget, options?: { maxQueuedBytes?: number }) {
    this.stream = stream;
    this.maxQueuedBytes = options?.maxQueuedBytes ?? DEFAULT_MAX_QUEUED_BYTES;

    this.drainHandler = () => {
      if (this.destroyed) return;
      this.waitingForDrain = false;
      this.flush();
    };

    this.closeHandler = () => {
      this.markDestroyed();
    };

    this.errorHandler = () => {
      this.markDestroyed();
    };

    this.stream.on('drain', this.drainHandler);
    this.stream.on('close', this.closeHandler);
    this.stream.on('error', this.errorHandler);
  }

  private markDestroyed(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.queue = [];
    this.queuedBytes = 0;
  }

  /**
   * Enqueue a chunk for writing
   */
  write(chunk: string): void {
    if (this.destroyed || chunk.length === 0) return;

    this.queue.push(chunk);
    this.queuedBytes += Buffer.byteLength(chunk, 'utf8');

    if (this.queuedBytes > this.peakQueuedBytes) {
      this.peakQueuedBytes = this.queuedBytes;
    }

    this.flush();

    if (this.queuedBytes > this.maxQueuedBytes && !this.overflowed) {
      this.overflowed = true;
      this.overflowCount++;
    }
  }

  /**
   * Write directly without queueing (for critical output like banners).
   * Ignores the queue, so only use it when nothing is queued or ordering does
   * not matter.
   */
  writeImmediate(chunk: string): boolean {
    if (this.destroyed) return false;

    this.totalBytesWritten += Buffer.byteLength(chunk, 'utf8');
    return this.stream.write(chunk);
  }

  /**
   * Flush queued chunks to the stream.
   * Stops when stream.write() returns false (buffer full).
   */
  private flush(): void {
    if (this.destroyed || this.writing || this.waitingForDrain) return;
    this.writing = true;

    let chunk = this.queue.shift();
    while (chunk !== undefined) {
      const bytes = Buffer.byteLength(chunk, 'utf8');
      this.queuedBytes -= bytes;
      this.totalBytesWritten += bytes;
      this.totalChunksWritten++;

      if (!this.stream.write(chunk)) {
        // Buffer full - wait for drain event
        this.drainCount++;
        this.waitingForDrain = true;
        break;
      }
      chunk = this.queue.shift();
    }

    this.writing = false;
  }

  /**
   * True once the backlog has passed maxQueuedBytes. Clears the flag and
   * discards the backlog; the caller must follow with a full redraw.
   */
  takeOverflow(): boolean {
    if (!this.overflowed) return false;
    this.overflowed = false;
    this.droppedChunks += this.queue.length;
    this.queue = [];
    this.queuedBytes = 0;
    return true;
  }

  /**
   * Check if we should skip rendering this frame.
   * Returns true if backlog is too high.
   */
  shouldSkipFrame(thresholdBytes: number = 128 * 1024): boolean {
    return this.queuedBytes > thresholdBytes;
  }

  getBacklogBytes(): number {
    return this.queuedBytes;
  }

  /**
   * Get all metrics as an object (for /stats endpoint).
   */
  getMetrics(): OutputPumpMetrics {
    return {
      queuedBytes: this.queuedBytes,
      peakQueuedBytes: this.peakQueuedBytes,
      droppedChunks: this.droppedChunks,
      overflowCount: this.overflowCount,
      drainCount: this.drainCount,
      totalBytesWritten: this.totalBytesWritten,
      totalChunksWritten: this.totalChunksWritten,
      queueLength: this.queue.length,
    };
  }

  /**
   * Check if the pump is destroyed (stream closed).
   */
  isDestroyed(): boolean {
    return this.destroyed;
  }

  /**
   * Destroy the pump, remove listeners, and clear queue.
   */
  destroy(): void {
    this.markDestroyed();

    this.stream.removeListener('drain', this.drainHandler);
    this.stream.removeListener('close', this.closeHandler);
    this.stream.removeListener('error', this.errorHandler);
  }
}

export interface OutputPumpMetrics {
  queuedBytes: number;
  peakQueuedBytes: number;
  droppedChunks: number;
  overflowCount: number;
  drainCount: number;
  totalBytesWritten: number;
  totalChunksWritten: number;
  queueLength: number;
}
