export type Vector3 = { x: number; y: number; z: number };

export type TelemetrySample = {
  deviceId: string;
  accel: Vector3;
  gyro: Vector3;
  mag?: Vector3;
  accelMagnitude: number;
  gyroMagnitude: number;
  /** Receipt time of the earlier of the two paired groups, ms since epoch. */
  timestamp: number;
  /** Receipt time of the group that completed the sample. */
  receivedAt: number;
  /** Gap between the receipt times of the paired groups. */
  pairingSkewMs: number;
  deviceTimestampNs?: number;
  watchId?: string;
};

export function magnitude(v: Vector3): number {
  return Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);
}

/** Milliseconds since the sample completed. */
export function sampleAge(sample: Pick<TelemetrySample, 'receivedAt'>, now = Date.now()): number {
  return Math.max(0, now - sample.receivedAt);
}
