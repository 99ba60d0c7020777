import { DeviceMessageSchema, type AxisGroup, type DeviceMessage } from './schemas.js';
import { magnitude, type TelemetrySample, type Vector3 } from './types.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('reassembler');

export const DEFAULT_STALE_PARTIAL_MS = 1000;

export type RawMessage = string | Buffer | ArrayBuffer | Buffer[];

type PendingGroup = {
  values: Vector3;
  receivedAt: number;
  deviceTimestampNs?: number;
  watchId?: string;
};

export type DeviceDiagnostics = {
  parseErrors: number;
  completed: number;
  staleDrops: number;
  replaced: number;
};

/**
 * Pending accel/gyro/mag groups for one device. Groups are paired by device
 * only: the wire format carries no shared sequence id, so a sample is the
 * most recent unpaired group of each kind.
 */
class DeviceSlot {
  readonly groups: Partial<Record<AxisGroup, PendingGroup>> = {};
  readonly stats: DeviceDiagnostics = { parseErrors: 0, completed: 0, staleDrops: 0, replaced: 0 };

  /** Receipt time of the oldest pending required group. `mag` never primes a slot. */
  primedAt(): number | null {
    const { accel, gyro } = this.groups;
    if (accel && gyro) return Math.min(accel.receivedAt, gyro.receivedAt);
    return accel?.receivedAt ?? gyro?.receivedAt ?? null;
  }

  isEmpty(): boolean {
    return Object.keys(this.groups).length === 0;
  }

  clear() {
    delete this.groups.accel;
    delete this.groups.gyro;
    delete this.groups.mag;
  }
}

export class TelemetryReassembler {
  private readonly slots = new Map<string, DeviceSlot>();
  private readonly stalePartialMs: number;
  private readonly now: () => number;

  constructor(options: { stalePartialMs?: number; now?: () => number } = {}) {
    this.stalePartialMs = options.stalePartialMs ?? DEFAULT_STALE_PARTIAL_MS;
    this.now = options.now ?? Date.now;
  }

  ingest(deviceId: string, raw: RawMessage): TelemetrySample | null {
    const slot = this.slotFor(deviceId);
    const message = parseMessage(raw);
    if (!message) {
      slot.stats.parseErrors += 1;
      log.debug({ deviceId, parseErrors: slot.stats.parseErrors }, 'Skipping malformed telemetry message');
      return null;
    }

    const now = this.now();
    this.evictIfStale(deviceId, slot, now);

    if (slot.groups[message.type]) {
      slot.stats.replaced += 1;
    }
    slot.groups[message.type] = {
      values: { x: message.x, y: message.y, z: message.z },
      receivedAt: now,
      deviceTimestampNs: message.timestamp_ns,
      watchId: message.watch_id
    };

    const { accel, gyro, mag } = slot.groups;
    if (!accel || !gyro) {
      return null;
    }

    slot.clear();
    slot.stats.completed += 1;

    return {
      deviceId,
      accel: accel.values,
      gyro: gyro.values,
      mag: mag?.values,
      accelMagnitude: magnitude(accel.values),
      gyroMagnitude: magnitude(gyro.values),
      timestamp: Math.min(accel.receivedAt, gyro.receivedAt),
      receivedAt: now,
      pairingSkewMs: Math.abs(accel.receivedAt - gyro.receivedAt),
      deviceTimestampNs: accel.deviceTimestampNs ?? gyro.deviceTimestampNs,
      watchId: accel.watchId ?? gyro.watchId
    };
  }

  /** Drops partial groups older than the staleness window for every device. */
  evictStale(): number {
    const now = this.now();
    let evicted = 0;
    for (const [deviceId, slot] of this.slots) {
      if (this.evictIfStale(deviceId, slot, now)) evicted += 1;
    }
    return evicted;
  }

  hasPending(deviceId: string): boolean {
    const slot = this.slots.get(deviceId);
    return slot ? !slot.isEmpty() : false;
  }

  diagnostics(deviceId: string): DeviceDiagnostics {
    const stats = this.slots.get(deviceId)?.stats;
    return stats ? { ...stats } : { parseErrors: 0, completed: 0, staleDrops: 0, replaced: 0 };
  }

  reset(deviceId?: string) {
    if (deviceId) {
      this.slots.get(deviceId)?.clear();
      return;
    }
    for (const slot of this.slots.values()) slot.clear();
  }

  private slotFor(deviceId: string): DeviceSlot {
    let slot = this.slots.get(deviceId);
    if (!slot) {
      slot = new DeviceSlot();
      this.slots.set(deviceId, slot);
    }
    return slot;
  }

  private evictIfStale(deviceId: string, slot: DeviceSlot, now: number): boolean {
    const mag = slot.groups.mag;
    if (mag && now - mag.receivedAt > this.stalePartialMs) {
      delete slot.groups.mag;
      log.debug({ deviceId, ageMs: now - mag.receivedAt }, 'Dropped stale magnetometer reading');
    }

    const primedAt = slot.primedAt();
    if (primedAt === null || now - primedAt <= this.stalePartialMs) {
      return false;
    }
    delete slot.groups.accel;
    delete slot.groups.gyro;
    slot.stats.staleDrops += 1;
    log.debug({ deviceId, ageMs: now - primedAt }, 'Dropped stale partial sample');
    return true;
  }
}

function parseMessage(raw: RawMessage): DeviceMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decode(raw));
  } catch {
    return null;
  }
  const result = DeviceMessageSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

function decode(raw: RawMessage): string {
  if (typeof raw === 'string') return raw;
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return raw.toString('utf8');
}
