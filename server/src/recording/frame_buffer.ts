import type { CameraFrame } from '../camera/types.js';

export type FrameBufferStats = {
  frames: number;
  maxFrames: number;
  durationMs: number;
  maxDurationMs: number;
  totalAdded: number;
};

/**
 * Rolling window of the most recent capture frames, bounded by age relative
 * to the newest frame and by count. Held while idle so a clip can open with
 * the moments that led up to it.
 */
export class FrameBuffer {
  readonly maxDurationMs: number;
  readonly maxFrames: number;
  private readonly frames: CameraFrame[] = [];
  private added = 0;

  constructor(params: { maxDurationMs: number; fps?: number; maxFrames?: number }) {
    if (!(params.maxDurationMs >= 0)) {
      throw new Error(`Frame buffer duration must be >= 0, got ${params.maxDurationMs}`);
    }
    this.maxDurationMs = params.maxDurationMs;
    // 20% headroom over the nominal rate before the count cap bites
    this.maxFrames = params.maxFrames ?? Math.max(1, Math.ceil((params.maxDurationMs / 1000) * (params.fps ?? 30) * 1.2));
  }

  get size(): number {
    return this.frames.length;
  }

  get totalAdded(): number {
    return this.added;
  }

  add(frame: CameraFrame) {
    this.frames.push(frame);
    this.added += 1;

    const cutoff = frame.timestampMs - this.maxDurationMs;
    while (this.frames.length > 0 && this.frames[0].timestampMs < cutoff) {
      this.frames.shift();
    }
    while (this.frames.length > this.maxFrames) {
      this.frames.shift();
    }
  }

  /** Frames no older than `durationMs` before the newest one, oldest first. */
  within(durationMs: number): CameraFrame[] {
    const newest = this.frames.at(-1);
    if (!newest || durationMs <= 0) return [];
    const cutoff = newest.timestampMs - durationMs;
    return this.frames.filter((frame) => frame.timestampMs >= cutoff);
  }

  /** Removes and returns everything held, oldest first. */
  take(): CameraFrame[] {
    return this.frames.splice(0, this.frames.length);
  }

  clear() {
    this.frames.length = 0;
  }

  stats(): FrameBufferStats {
    const oldest = this.frames[0];
    const newest = this.frames.at(-1);
    return {
      frames: this.frames.length,
      maxFrames: this.maxFrames,
      durationMs: oldest && newest ? newest.timestampMs - oldest.timestampMs : 0,
      maxDurationMs: this.maxDurationMs,
      totalAdded: this.added
    };
  }
}
