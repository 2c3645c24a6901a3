/**
 * Frame Buffer
 *
 * Fixed-capacity ring buffer between the connector (producer) and the
 * segmenter (single consumer). When full, the oldest unconsumed frame is
 * evicted so the producer never waits: audio continuity is traded for
 * real-time progress.
 */

import type { AudioFrame, FrameDroppedEvent } from "@shared/schema";

export interface FrameBufferStats {
  capacity: number;
  size: number;
  pushed: number;
  popped: number;
  dropped: number;
  highWater: number;
}

const MAX_RECORDED_DROPS = 1000;

export class FrameBuffer {
  private readonly slots: Array<AudioFrame | undefined>;
  private head = 0;
  private count = 0;
  private dropLog: FrameDroppedEvent[] = [];

  private counters = {
    pushed: 0,
    popped: 0,
    dropped: 0,
    highWater: 0,
  };

  constructor(
    readonly capacity: number,
    private readonly onDrop?: (event: FrameDroppedEvent) => void
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Frame buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<AudioFrame | undefined>(capacity);
  }

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  /**
   * Returns the evicted frame when the push overflowed, otherwise null.
   */
  push(frame: AudioFrame): AudioFrame | null {
    this.counters.pushed++;
    let evicted: AudioFrame | null = null;

    if (this.count === this.capacity) {
      evicted = this.slots[this.head] ?? null;
      this.slots[this.head] = undefined;
      this.head = (this.head + 1) % this.capacity;
      this.count--;

      if (evicted) {
        this.recordDrop(evicted.sequence);
      }
    }

    const tail = (this.head + this.count) % this.capacity;
    this.slots[tail] = frame;
    this.count++;
    this.counters.highWater = Math.max(this.counters.highWater, this.count);

    return evicted;
  }

  pop(): AudioFrame | undefined {
    if (this.count === 0) return undefined;

    const frame = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    this.counters.popped++;
    return frame;
  }

  clear(): number {
    const cleared = this.count;
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
    return cleared;
  }

  drops(): ReadonlyArray<FrameDroppedEvent> {
    return [...this.dropLog];
  }

  stats(): FrameBufferStats {
    return {
      capacity: this.capacity,
      size: this.count,
      ...this.counters,
    };
  }

  private recordDrop(sequence: number): void {
    const event: FrameDroppedEvent = {
      sequence,
      reason: "overflow",
      droppedAt: Date.now(),
    };
    this.counters.dropped++;
    this.dropLog.push(event);
    if (this.dropLog.length > MAX_RECORDED_DROPS) {
      this.dropLog.shift();
    }
    this.onDrop?.(event);
  }
}
