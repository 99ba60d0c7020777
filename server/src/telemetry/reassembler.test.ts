import { describe, it, expect, beforeEach } from 'vitest';
import { TelemetryReassembler } from './reassembler.js';

const accel = (x: number, y: number, z: number) => JSON.stringify({ type: 'accel', x, y, z });
const gyro = (x: number, y: number, z: number) => JSON.stringify({ type: 'gyro', x, y, z });

describe('TelemetryReassembler', () => {
  let clock: number;
  let reassembler: TelemetryReassembler;

  beforeEach(() => {
    clock = 1_000_000;
    reassembler = new TelemetryReassembler({ stalePartialMs: 1000, now: () => clock });
  });

  it('emits one sample once accel and gyro have both arrived', () => {
    expect(reassembler.ingest('left', accel(1, 2, 3))).toBeNull();
    clock += 5;
    const sample = reassembler.ingest('left', gyro(0.1, 0.2, 0.3));

    expect(sample).not.toBeNull();
    expect(sample?.deviceId).toBe('left');
    expect(sample?.accel).toEqual({ x: 1, y: 2, z: 3 });
    expect(sample?.gyro).toEqual({ x: 0.1, y: 0.2, z: 0.3 });
    expect(sample?.accelMagnitude).toBeCloseTo(Math.sqrt(14), 12);
    expect(sample?.gyroMagnitude).toBeCloseTo(Math.sqrt(0.14), 12);
    expect(sample?.timestamp).toBe(1_000_000);
    expect(sample?.receivedAt).toBe(1_000_005);
    expect(sample?.pairingSkewMs).toBe(5);
  });

  it('pairs groups in either order', () => {
    expect(reassembler.ingest('left', gyro(0, 0, 1))).toBeNull();
    const sample = reassembler.ingest('left', accel(0, 0, 9.81));

    expect(sample?.accel.z).toBe(9.81);
    expect(sample?.gyro.z).toBe(1);
  });

  it('never emits from a single group', () => {
    expect(reassembler.ingest('left', accel(1, 1, 1))).toBeNull();
    expect(reassembler.ingest('left', accel(2, 2, 2))).toBeNull();
    expect(reassembler.hasPending('left')).toBe(true);
  });

  it('uses the newest group when one kind repeats', () => {
    reassembler.ingest('left', accel(1, 1, 1));
    reassembler.ingest('left', accel(2, 2, 2));
    const sample = reassembler.ingest('left', gyro(0, 0, 0));

    expect(sample?.accel).toEqual({ x: 2, y: 2, z: 2 });
    expect(reassembler.diagnostics('left').replaced).toBe(1);
  });

  it('clears the slot after emitting', () => {
    reassembler.ingest('left', accel(1, 1, 1));
    reassembler.ingest('left', gyro(1, 1, 1));

    expect(reassembler.hasPending('left')).toBe(false);
    expect(reassembler.ingest('left', gyro(2, 2, 2))).toBeNull();
  });

  it('keeps devices independent', () => {
    reassembler.ingest('left', accel(1, 2, 3));
    expect(reassembler.ingest('right', gyro(0.1, 0.2, 0.3))).toBeNull();

    const left = reassembler.ingest('left', gyro(0.1, 0.2, 0.3));
    expect(left?.deviceId).toBe('left');
    expect(reassembler.hasPending('right')).toBe(true);
  });

  it('skips malformed messages and counts them', () => {
    expect(reassembler.ingest('left', '{not json')).toBeNull();
    expect(reassembler.ingest('left', JSON.stringify({ type: 'pressure', x: 1, y: 2, z: 3 }))).toBeNull();
    expect(reassembler.ingest('left', JSON.stringify({ type: 'accel', x: 1, y: 2 }))).toBeNull();
    expect(reassembler.ingest('left', JSON.stringify({ type: 'gyro', x: 'a', y: 0, z: 0 }))).toBeNull();

    expect(reassembler.diagnostics('left').parseErrors).toBe(4);
    expect(reassembler.hasPending('left')).toBe(false);
  });

  it('keeps a pending group across a malformed message', () => {
    reassembler.ingest('left', accel(1, 2, 3));
    expect(reassembler.ingest('left', '{"type":"gyro","x":')).toBeNull();
    const sample = reassembler.ingest('left', gyro(0, 0, 1));

    expect(sample?.accel).toEqual({ x: 1, y: 2, z: 3 });
    expect(sample?.gyro).toEqual({ x: 0, y: 0, z: 1 });
    expect(reassembler.diagnostics('left')).toEqual({ parseErrors: 1, completed: 1, staleDrops: 0, replaced: 0 });
  });

  it('accepts binary frames and long group names', () => {
    reassembler.ingest('left', Buffer.from(JSON.stringify({ type: 'accelerometer', x: 1, y: 0, z: 0 })));
    const sample = reassembler.ingest('left', JSON.stringify({ type: 'gyroscope', x: 0, y: 1, z: 0 }));

    expect(sample?.accel.x).toBe(1);
    expect(sample?.gyro.y).toBe(1);
  });

  it('carries the magnetometer when it arrived first', () => {
    reassembler.ingest('left', JSON.stringify({ type: 'mag', x: 30, y: 0, z: -10 }));
    reassembler.ingest('left', accel(0, 0, 1));
    const sample = reassembler.ingest('left', gyro(0, 0, 0));

    expect(sample?.mag).toEqual({ x: 30, y: 0, z: -10 });
  });

  it('expires an old magnetometer reading without dropping a fresh pair', () => {
    reassembler.ingest('left', JSON.stringify({ type: 'mag', x: 30, y: 0, z: -10 }));
    clock += 999;
    reassembler.ingest('left', accel(0, 0, 1));
    clock += 2;
    const sample = reassembler.ingest('left', gyro(0, 0, 0));

    expect(sample).not.toBeNull();
    expect(sample?.mag).toBeUndefined();
    expect(sample?.pairingSkewMs).toBe(2);
    expect(reassembler.diagnostics('left')).toEqual({ parseErrors: 0, completed: 1, staleDrops: 0, replaced: 0 });
  });

  it('keeps a fresh magnetometer reading when a stale partial is dropped', () => {
    reassembler.ingest('left', accel(1, 1, 1));
    clock += 600;
    reassembler.ingest('left', JSON.stringify({ type: 'mag', x: 5, y: 5, z: 5 }));
    clock += 500;

    expect(reassembler.evictStale()).toBe(1);
    expect(reassembler.hasPending('left')).toBe(true);

    reassembler.ingest('left', accel(2, 2, 2));
    const sample = reassembler.ingest('left', gyro(0, 0, 0));
    expect(sample?.accel).toEqual({ x: 2, y: 2, z: 2 });
    expect(sample?.mag).toEqual({ x: 5, y: 5, z: 5 });
  });

  it('passes through device timestamps and watch ids', () => {
    reassembler.ingest(
      'left',
      JSON.stringify({ type: 'accel', x: 0, y: 0, z: 1, timestamp_ns: 123456789, watch_id: 'watch-a' })
    );
    const sample = reassembler.ingest('left', gyro(0, 0, 0));

    expect(sample?.deviceTimestampNs).toBe(123456789);
    expect(sample?.watchId).toBe('watch-a');
  });

  it('drops a partial that waited longer than the staleness window', () => {
    reassembler.ingest('left', accel(1, 1, 1));
    clock += 1001;

    expect(reassembler.ingest('left', gyro(0, 0, 0))).toBeNull();
    expect(reassembler.diagnostics('left').staleDrops).toBe(1);

    const sample = reassembler.ingest('left', accel(3, 3, 3));
    expect(sample?.accel).toEqual({ x: 3, y: 3, z: 3 });
    expect(sample?.pairingSkewMs).toBe(0);
  });

  it('pairs groups right at the edge of the window', () => {
    reassembler.ingest('left', accel(1, 1, 1));
    clock += 1000;

    expect(reassembler.ingest('left', gyro(0, 0, 0))).not.toBeNull();
  });

  it('evicts stale partials across devices on demand', () => {
    reassembler.ingest('left', accel(1, 1, 1));
    clock += 500;
    reassembler.ingest('right', accel(1, 1, 1));
    clock += 600;

    expect(reassembler.evictStale()).toBe(1);
    expect(reassembler.hasPending('left')).toBe(false);
    expect(reassembler.hasPending('right')).toBe(true);
  });

  it('forgets partial state on reset', () => {
    reassembler.ingest('left', accel(1, 1, 1));
    reassembler.reset('left');

    expect(reassembler.ingest('left', gyro(0, 0, 0))).toBeNull();
  });
});
