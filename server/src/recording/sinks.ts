import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import type { TelemetrySample } from '../telemetry/types.js';
import type { CameraFrame } from '../camera/types.js';
import { clipFileName } from './timestamp.js';

export const TELEMETRY_COLUMNS = [
  'timestamp',
  'accel_x',
  'accel_y',
  'accel_z',
  'gyro_x',
  'gyro_y',
  'gyro_z',
  'mag_x',
  'mag_y',
  'mag_z',
  'watch_name'
] as const;

export interface TelemetrySink {
  readonly path: string;
  open(): Promise<void>;
  write(samples: readonly TelemetrySample[]): Promise<void>;
  close(): Promise<void>;
}

export interface VideoSink {
  readonly path: string;
  open(): Promise<void>;
  writeFrame(frame: CameraFrame): Promise<void>;
  close(): Promise<void>;
}

/** What opened a clip; also the video file's prefix. */
export type ClipTrigger = 'manual' | 'stillness';

export type ClipContext = {
  dir: string;
  trigger: ClipTrigger;
  token: string;
  sessionId: string;
  startedAt: number;
};

export interface SinkFactory {
  telemetry(context: ClipContext, deviceId: string): TelemetrySink;
  video(context: ClipContext): VideoSink;
}

abstract class FileSink {
  readonly path: string;
  protected handle: FileHandle | null = null;

  constructor(filePath: string) {
    this.path = filePath;
  }

  async open() {
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    this.handle = await fs.open(this.path, 'w');
    await this.onOpen();
  }

  protected async onOpen() {}

  protected async append(data: string | Buffer) {
    if (!this.handle) {
      throw new Error(`Sink not open: ${this.path}`);
    }
    await this.handle.write(data);
  }

  async close() {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    try {
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}

export class CsvTelemetrySink extends FileSink implements TelemetrySink {
  private readonly context: ClipContext;
  private readonly deviceId: string;

  constructor(context: ClipContext, deviceId: string) {
    super(path.join(context.dir, clipFileName(deviceId, context.token, 'csv')));
    this.context = context;
    this.deviceId = deviceId;
  }

  protected async onOpen() {
    await this.append(
      `# Session ID: ${this.context.sessionId}\n` +
        `# Device ID: ${this.deviceId}\n` +
        `# Start Time: ${this.context.startedAt}\n` +
        `${TELEMETRY_COLUMNS.join(',')}\n`
    );
  }

  async write(samples: readonly TelemetrySample[]) {
    if (samples.length === 0) return;
    await this.append(samples.map((sample) => `${formatRow(sample, this.deviceId)}\n`).join(''));
  }
}

/** Writes JPEG frames back to back, which players read as Motion-JPEG. */
export class MjpegVideoSink extends FileSink implements VideoSink {
  constructor(context: ClipContext, ext: string) {
    super(path.join(context.dir, clipFileName(context.trigger, context.token, ext)));
  }

  async writeFrame(frame: CameraFrame) {
    await this.append(frame.colorJpeg);
  }
}

export function createFileSinkFactory(videoExt: string): SinkFactory {
  return {
    telemetry: (context, deviceId) => new CsvTelemetrySink(context, deviceId),
    video: (context) => new MjpegVideoSink(context, videoExt)
  };
}

export function formatRow(sample: TelemetrySample, watchName: string): string {
  const mag = sample.mag ?? { x: 0, y: 0, z: 0 };
  return [
    sample.timestamp / 1000,
    sample.accel.x,
    sample.accel.y,
    sample.accel.z,
    sample.gyro.x,
    sample.gyro.y,
    sample.gyro.z,
    mag.x,
    mag.y,
    mag.z,
    watchName
  ].join(',');
}
