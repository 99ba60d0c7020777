import { EventEmitter } from 'events';
import { z } from 'zod';
import type { CameraFrame } from '../camera/types.js';
import { CaptureUnavailableError } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('capture');

export const FrameSchema = z.object({
  image_base64: z.string().min(1),
  mime: z.literal('image/jpeg').default('image/jpeg'),
  camera: z.number().int().nonnegative().optional(),
  ts_ms: z.number().nonnegative().optional()
});

export type FramePayload = z.infer<typeof FrameSchema>;

/**
 * Color frames pushed in by the capture bridge, over HTTP or the WebSocket
 * hub. Emits `frame` with a CameraFrame for every accepted payload.
 */
export class CaptureFeed extends EventEmitter {
  readonly camera: number;
  private lastFrame: CameraFrame | null = null;
  private counter = 0;
  private rejected = 0;

  constructor(camera = 0) {
    super();
    this.camera = camera;
  }

  get frames(): number {
    return this.counter;
  }

  get rejectedFrames(): number {
    return this.rejected;
  }

  latest(): CameraFrame | null {
    return this.lastFrame;
  }

  ingest(body: unknown): CameraFrame | null {
    const parsed = FrameSchema.safeParse(body);
    if (!parsed.success) {
      this.rejected += 1;
      log.warn({ rejected: this.rejected }, 'Frame payload invalid');
      return null;
    }

    const colorJpeg = Buffer.from(parsed.data.image_base64, 'base64');
    if (colorJpeg.length === 0) {
      this.rejected += 1;
      log.warn({ rejected: this.rejected }, 'Frame payload decoded to zero bytes');
      return null;
    }

    const timestampMs = parsed.data.ts_ms ?? Date.now();
    const frame: CameraFrame = {
      id: `${timestampMs}-${this.counter++}`,
      camera: parsed.data.camera ?? this.camera,
      timestampMs,
      colorJpeg
    };
    this.lastFrame = frame;
    this.emit('frame', frame);
    return frame;
  }

  /** Resolves with the next frame to arrive; rejects when none comes in time. */
  waitForFrame(timeoutMs: number): Promise<CameraFrame> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        reject(new CaptureUnavailableError(this.camera, timeoutMs));
      }, timeoutMs);

      const onFrame = (frame: CameraFrame) => {
        cleanup();
        resolve(frame);
      };

      const cleanup = () => {
        clearTimeout(timer);
        this.off('frame', onFrame);
      };

      this.on('frame', onFrame);
    });
  }
}
