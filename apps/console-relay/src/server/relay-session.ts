import type { CursorPosition, ScreenCapture } from '@gridrelay/protocol';
import {
  OutputPump,
  RedrawDriver,
  ScreenBuffer,
  TerminalEncoder,
  type OutputPumpMetrics,
  type WritableTarget,
} from '@gridrelay/render';
import { applyFrame } from '../capture/capture-loader.js';

export interface RelaySessionConfig {
  id: string;
  stream: WritableTarget;
  cols: number;
  rows: number;
  capture: ScreenCapture;
  frameIntervalMs: number;
  bypassMode: boolean;
  maxQueuedBytes: number;
}

/**
 * Replays a screen capture to one terminal. Owns its own encoder, so each
 * connection keeps its own belief about the remote cursor.
 */
export class RelaySession {
  readonly id: string;
  private capture: ScreenCapture;
  private frameIntervalMs: number;
  private pump: OutputPump;
  private encoder: TerminalEncoder;
  private driver: RedrawDriver;
  private buffer: ScreenBuffer;
  private frameIndex = 0;
  private timer: NodeJS.Timeout | null = null;
  private destroyed = false;
  private skippedFrames = 0;

  constructor(config: RelaySessionConfig) {
    this.id = config.id;
    this.capture = config.capture;
    this.frameIntervalMs = config.frameIntervalMs;
    this.pump = new OutputPump(config.stream, { maxQueuedBytes: config.maxQueuedBytes });
    this.encoder = new TerminalEncoder(this.pump, { bypassMode: config.bypassMode });
    this.driver = new RedrawDriver(this.encoder);
    this.buffer = new ScreenBuffer(config.cols, config.rows);
  }

  start(): void {
    console.log(`[session] ${this.id} started (${this.buffer.width}x${this.buffer.height})`);
    this.showFrame(0);
  }

  resize(cols: number, rows: number): void {
    if (this.destroyed) return;
    this.buffer.resize(cols, rows);
    this.driver.invalidate();
    this.redraw();
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pump.destroy();
    console.log(`[session] ${this.id} closed (${this.skippedFrames} frames skipped)`);
  }

  getTransportMetrics(): OutputPumpMetrics {
    return this.pump.getMetrics();
  }

  private showFrame(index: number): void {
    if (this.destroyed) return;
    this.frameIndex = index;
    const frame = this.capture.frames[index];
    if (!frame) return;

    if (this.pump.shouldSkipFrame()) {
      this.skippedFrames++;
    } else {
      this.redraw();
    }

    const delay = frame.delayMs ?? this.frameIntervalMs;
    this.timer = setTimeout(() => {
      this.showFrame((index + 1) % this.capture.frames.length);
    }, delay);
  }

  private redraw(): void {
    const frame = this.capture.frames[this.frameIndex];
    if (!frame || this.pump.isDestroyed()) return;

    applyFrame(this.buffer, frame, this.capture.width);

    // Discarded output leaves the terminal in an unknown state
    const full = this.pump.takeOverflow();
    if (full) {
      console.warn(`[session] ${this.id} output overflowed, redrawing`);
    }
    this.driver.redraw(this.buffer, this.clampCursor(frame.cursor), { full });
  }

  private clampCursor([column, row]: CursorPosition): CursorPosition {
    return [
      Math.min(column, Math.max(0, this.buffer.width - 1)),
      Math.min(row, Math.max(0, this.buffer.height - 1)),
    ];
  }
}
