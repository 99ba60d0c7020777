import { describe, it, expect } from 'vitest';
import { StillnessDetector } from './stillness.js';
import type { TelemetrySample } from '../telemetry/types.js';

function sample(deviceId: string, timestamp: number, gyroMagnitude: number): TelemetrySample {
  return {
    deviceId,
    accel: { x: 0, y: 0, z: 9.81 },
    gyro: { x: gyroMagnitude, y: 0, z: 0 },
    accelMagnitude: 9.81,
    gyroMagnitude,
    timestamp,
    receivedAt: timestamp,
    pairingSkewMs: 0
  };
}

describe('StillnessDetector', () => {
  const options = { motionThreshold: 3, stillnessThreshold: 0.5, stillnessDurationMs: 1000 };

  it('ignores stillness before any movement', () => {
    const detector = new StillnessDetector(options);

    expect(detector.update(sample('left', 0, 0.1))).toBe(false);
    expect(detector.update(sample('left', 5000, 0.1))).toBe(false);
    expect(detector.stats().armed).toBe(false);
  });

  it('fires once after movement followed by enough stillness', () => {
    const detector = new StillnessDetector(options);
    detector.update(sample('left', 0, 6));

    expect(detector.update(sample('left', 100, 0.2))).toBe(false);
    expect(detector.update(sample('left', 600, 0.2))).toBe(false);
    expect(detector.stats().stillForMs).toBe(500);
    expect(detector.update(sample('left', 1100, 0.2))).toBe(true);
    expect(detector.update(sample('left', 3000, 0.2))).toBe(false);
    expect(detector.stats()).toMatchObject({ armed: false, triggers: 1 });
  });

  it('restarts the stillness timer on a small movement', () => {
    const detector = new StillnessDetector(options);
    detector.update(sample('left', 0, 6));
    detector.update(sample('left', 100, 0.2));
    detector.update(sample('left', 900, 1));

    expect(detector.update(sample('left', 1200, 0.2))).toBe(false);
    expect(detector.update(sample('left', 2200, 0.2))).toBe(true);
  });

  it('waits until every device is still', () => {
    const detector = new StillnessDetector(options);
    detector.update(sample('left', 0, 6));
    detector.update(sample('right', 0, 0.1));
    detector.update(sample('left', 100, 0.1));
    detector.update(sample('right', 200, 2));

    expect(detector.update(sample('left', 1500, 0.1))).toBe(false);
    detector.update(sample('right', 1600, 0.1));
    expect(detector.update(sample('left', 2600, 0.1))).toBe(true);
  });

  it('arms again after fresh movement', () => {
    const detector = new StillnessDetector(options);
    detector.update(sample('left', 0, 6));
    detector.update(sample('left', 100, 0.1));
    expect(detector.update(sample('left', 1100, 0.1))).toBe(true);

    detector.update(sample('left', 2000, 5));
    detector.update(sample('left', 2100, 0.1));
    expect(detector.update(sample('left', 3100, 0.1))).toBe(true);
    expect(detector.stats().triggers).toBe(2);
  });

  it('rejects a stillness threshold above the motion threshold', () => {
    expect(() => new StillnessDetector({ motionThreshold: 1, stillnessThreshold: 2 })).toThrow('Stillness threshold');
  });
});
