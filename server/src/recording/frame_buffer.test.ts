import { describe, it, expect } from 'vitest';
import { FrameBuffer } from './frame_buffer.js';
import type { CameraFrame } from '../camera/types.js';

function frame(timestampMs: number): CameraFrame {
  return { id: `f${timestampMs}`, camera: 0, timestampMs, colorJpeg: Buffer.from(`jpeg-${timestampMs}`) };
}

const ids = (frames: CameraFrame[]) => frames.map((value) => value.id);

describe('FrameBuffer', () => {
  it('sizes the frame cap from duration and rate with headroom', () => {
    expect(new FrameBuffer({ maxDurationMs: 10_000 }).maxFrames).toBe(360);
    expect(new FrameBuffer({ maxDurationMs: 1000, fps: 25 }).maxFrames).toBe(30);
  });

  it('drops frames older than the window behind the newest frame', () => {
    const buffer = new FrameBuffer({ maxDurationMs: 1000 });
    for (const ts of [0, 400, 900, 1500]) buffer.add(frame(ts));

    expect(buffer.size).toBe(2);
    expect(ids(buffer.take())).toEqual(['f900', 'f1500']);
  });

  it('keeps a frame exactly at the window edge', () => {
    const buffer = new FrameBuffer({ maxDurationMs: 1000 });
    buffer.add(frame(500));
    buffer.add(frame(1500));

    expect(buffer.size).toBe(2);
  });

  it('drops the oldest frames once the count cap is reached', () => {
    const buffer = new FrameBuffer({ maxDurationMs: 10_000, maxFrames: 2 });
    for (const ts of [0, 10, 20]) buffer.add(frame(ts));

    expect(ids(buffer.take())).toEqual(['f10', 'f20']);
    expect(buffer.totalAdded).toBe(3);
  });

  it('returns the most recent stretch without removing it', () => {
    const buffer = new FrameBuffer({ maxDurationMs: 5000 });
    for (const ts of [1000, 2000, 3000, 4000]) buffer.add(frame(ts));

    expect(ids(buffer.within(1500))).toEqual(['f3000', 'f4000']);
    expect(buffer.within(0)).toEqual([]);
    expect(buffer.size).toBe(4);
  });

  it('empties on take and reports its span', () => {
    const buffer = new FrameBuffer({ maxDurationMs: 5000, maxFrames: 10 });
    buffer.add(frame(1000));
    buffer.add(frame(1750));

    expect(buffer.stats()).toEqual({
      frames: 2,
      maxFrames: 10,
      durationMs: 750,
      maxDurationMs: 5000,
      totalAdded: 2
    });
    buffer.take();
    expect(buffer.size).toBe(0);
    expect(buffer.stats().durationMs).toBe(0);
  });

  it('rejects a negative duration', () => {
    expect(() => new FrameBuffer({ maxDurationMs: -1 })).toThrow('Frame buffer duration');
  });
});
