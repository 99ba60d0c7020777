import type { TelemetrySample } from '../telemetry/types.js';

export type StillnessOptions = {
  /** Gyro magnitude (rad/s) that counts as juggling and arms the detector. */
  motionThreshold: number;
  /** Gyro magnitude (rad/s) at or below which the hands count as still. */
  stillnessThreshold: number;
  stillnessDurationMs: number;
};

export const DEFAULT_STILLNESS: StillnessOptions = {
  motionThreshold: 3,
  stillnessThreshold: 0.5,
  stillnessDurationMs: 3000
};

export type StillnessStats = {
  motion: number;
  armed: boolean;
  stillForMs: number;
  triggers: number;
};

/**
 * Fires once when every device has stayed at or below the stillness threshold
 * for the configured time, after having moved above the motion threshold.
 * The motion value is the largest latest gyro magnitude across devices, and
 * time comes from sample timestamps. After firing it needs fresh movement to
 * arm again.
 */
export class StillnessDetector {
  private readonly options: StillnessOptions;
  private readonly latest = new Map<string, number>();
  private armed = false;
  private stillSince: number | null = null;
  private lastAt = 0;
  private triggers = 0;

  constructor(options: Partial<StillnessOptions> = {}) {
    this.options = { ...DEFAULT_STILLNESS, ...options };
    if (this.options.stillnessThreshold > this.options.motionThreshold) {
      throw new Error('Stillness threshold must not exceed the motion threshold');
    }
  }

  update(sample: TelemetrySample): boolean {
    this.latest.set(sample.deviceId, sample.gyroMagnitude);
    this.lastAt = sample.timestamp;
    const motion = this.motion();

    if (motion > this.options.motionThreshold) {
      this.armed = true;
    }
    if (!this.armed) return false;

    if (motion > this.options.stillnessThreshold) {
      this.stillSince = null;
      return false;
    }

    this.stillSince ??= sample.timestamp;
    if (sample.timestamp - this.stillSince < this.options.stillnessDurationMs) {
      return false;
    }

    this.armed = false;
    this.stillSince = null;
    this.triggers += 1;
    return true;
  }

  reset() {
    this.latest.clear();
    this.armed = false;
    this.stillSince = null;
  }

  stats(): StillnessStats {
    return {
      motion: this.motion(),
      armed: this.armed,
      stillForMs: this.stillSince === null ? 0 : this.lastAt - this.stillSince,
      triggers: this.triggers
    };
  }

  private motion(): number {
    let max = 0;
    for (const value of this.latest.values()) {
      if (value > max) max = value;
    }
    return max;
  }
}
