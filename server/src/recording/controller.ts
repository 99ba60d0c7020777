import { EventEmitter } from 'events';
import fs from 'fs/promises';
import path from 'path';
import type { TelemetrySample } from '../telemetry/types.js';
import type { CameraFrame } from '../camera/types.js';
import {
  createFileSinkFactory,
  type ClipContext,
  type ClipTrigger,
  type SinkFactory,
  type TelemetrySink,
  type VideoSink
} from './sinks.js';
import type { FrameBuffer } from './frame_buffer.js';
import { formatToken, uniqueToken } from './timestamp.js';
import { componentLogger } from '../logger.js';
import { describeError } from '../errors.js';

const log = componentLogger('recording');

export type RecordingState = 'idle' | 'active';

export type ClipSummary = {
  token: string;
  trigger: ClipTrigger;
  startedAt: number;
  stoppedAt: number | null;
  videoPath: string | null;
  telemetryPaths: Record<string, string>;
  samples: Record<string, number>;
  frames: number;
  /** Frames taken from the pre-roll buffer when the clip opened; included in `frames`. */
  preRollFrames: number;
  failedSinks: string[];
};

export type SinkFailure = {
  token: string;
  sink: string;
  stage: 'open' | 'write' | 'close';
  error: string;
};

export type RecordingStatus = {
  state: RecordingState;
  sessionDir: string;
  clips: number;
  current: ClipSummary | null;
};

type ActiveClip = {
  summary: ClipSummary;
  video: VideoSink | null;
  telemetry: Map<string, TelemetrySink>;
};

const DEFAULT_FLUSH_THRESHOLD = 50;

/**
 * Idle/Active toggle for recording. Each Active period is one clip: one token
 * shared by `<trigger>_<token>.<ext>` and every `<device>_<token>.csv`.
 * All work runs through a single promise chain so a toggle never interleaves
 * with a flush. With a pre-roll buffer, frames that arrive while idle are
 * held there and written at the head of the next clip's video.
 */
export class RecordingSessionController extends EventEmitter {
  readonly sessionDir: string;
  private readonly sessionId: string;
  private readonly devices: () => readonly string[];
  private readonly sinks: SinkFactory;
  private readonly now: () => Date;
  private readonly flushThreshold: number;
  private readonly preRoll: FrameBuffer | null;

  private clip: ActiveClip | null = null;
  private readonly buffers = new Map<string, TelemetrySample[]>();
  private readonly usedTokens = new Set<string>();
  private readonly history: ClipSummary[] = [];
  private chain: Promise<unknown> = Promise.resolve();

  constructor(params: {
    outputDir: string;
    devices: () => readonly string[];
    videoExt?: string;
    sinks?: SinkFactory;
    now?: () => Date;
    flushThreshold?: number;
    preRoll?: FrameBuffer;
  }) {
    super();
    this.now = params.now ?? (() => new Date());
    this.sessionId = formatToken(this.now());
    this.sessionDir = path.resolve(params.outputDir, `session_${this.sessionId}`);
    this.devices = params.devices;
    this.sinks = params.sinks ?? createFileSinkFactory(params.videoExt ?? 'mjpeg');
    this.flushThreshold = params.flushThreshold ?? DEFAULT_FLUSH_THRESHOLD;
    this.preRoll = params.preRoll ?? null;
  }

  get state(): RecordingState {
    return this.clip ? 'active' : 'idle';
  }

  clips(): ClipSummary[] {
    return this.history.map((summary) => ({ ...summary }));
  }

  status(): RecordingStatus {
    return {
      state: this.state,
      sessionDir: this.sessionDir,
      clips: this.history.length,
      current: this.clip ? { ...this.clip.summary } : null
    };
  }

  /** Opens a clip when idle, closes the current one when active. */
  toggle(trigger: ClipTrigger = 'manual'): Promise<RecordingStatus> {
    return this.enqueue(async () => {
      if (this.clip) {
        await this.stopClip();
      } else {
        await this.startClip(trigger);
      }
      const status = this.status();
      this.emit('state', status);
      return status;
    });
  }

  /** Opens a clip only when idle; resolves to null if one is already open. */
  start(trigger: ClipTrigger = 'manual'): Promise<RecordingStatus | null> {
    return this.enqueue(async () => {
      if (this.clip) return null;
      await this.startClip(trigger);
      const status = this.status();
      this.emit('state', status);
      return status;
    });
  }

  /** Closes the open clip, or only the clip with `token` when one is given. */
  stop(token?: string): Promise<ClipSummary | null> {
    return this.enqueue(async () => {
      if (!this.clip || (token !== undefined && this.clip.summary.token !== token)) return null;
      const summary = await this.stopClip();
      this.emit('state', this.status());
      return summary;
    });
  }

  appendSamples(samples: readonly TelemetrySample[]): Promise<void> {
    return this.enqueue(async () => {
      const clip = this.clip;
      if (!clip || samples.length === 0) return;

      for (const sample of samples) {
        if (!clip.telemetry.has(sample.deviceId)) continue;
        const buffer = this.buffers.get(sample.deviceId) ?? [];
        buffer.push(sample);
        this.buffers.set(sample.deviceId, buffer);
      }

      for (const [deviceId, buffer] of this.buffers) {
        if (buffer.length >= this.flushThreshold) {
          await this.flushDevice(clip, deviceId);
        }
      }
    });
  }

  appendFrame(frame: CameraFrame): Promise<void> {
    return this.enqueue(async () => {
      const clip = this.clip;
      if (!clip) {
        this.preRoll?.add(frame);
        return;
      }
      const video = clip.video;
      if (!video) return;
      try {
        await video.writeFrame(frame);
        clip.summary.frames += 1;
      } catch (error) {
        clip.video = null;
        clip.summary.videoPath = null;
        await this.failSink(clip, video, 'write', error);
      }
    });
  }

  /** Closes any open clip. Safe to call repeatedly and from shutdown hooks. */
  finalize(): Promise<ClipSummary | null> {
    return this.enqueue(async () => {
      if (!this.clip) return null;
      log.warn({ token: this.clip.summary.token }, 'Finalizing open clip on shutdown');
      return this.stopClip();
    });
  }

  private async startClip(trigger: ClipTrigger) {
    await fs.mkdir(this.sessionDir, { recursive: true });

    const startedAt = this.now();
    const token = uniqueToken(formatToken(startedAt), this.usedTokens);
    this.usedTokens.add(token);

    const context: ClipContext = {
      dir: this.sessionDir,
      trigger,
      token,
      sessionId: this.sessionId,
      startedAt: startedAt.getTime()
    };
    const summary: ClipSummary = {
      token,
      trigger,
      startedAt: context.startedAt,
      stoppedAt: null,
      videoPath: null,
      telemetryPaths: {},
      samples: {},
      frames: 0,
      preRollFrames: 0,
      failedSinks: []
    };
    const clip: ActiveClip = { summary, video: null, telemetry: new Map() };
    this.buffers.clear();

    const video = this.sinks.video(context);
    const preRoll = this.preRoll?.take() ?? [];
    try {
      await video.open();
      clip.video = video;
      summary.videoPath = video.path;
    } catch (error) {
      await this.failSink(clip, video, 'open', error);
    }
    if (clip.video) {
      await this.writePreRoll(clip, clip.video, preRoll);
    }

    for (const deviceId of this.devices()) {
      const sink = this.sinks.telemetry(context, deviceId);
      try {
        await sink.open();
        clip.telemetry.set(deviceId, sink);
        summary.telemetryPaths[deviceId] = sink.path;
        summary.samples[deviceId] = 0;
      } catch (error) {
        await this.failSink(clip, sink, 'open', error);
      }
    }

    this.clip = clip;
    log.info(
      { token, trigger, dir: this.sessionDir, devices: Array.from(clip.telemetry.keys()), preRoll: summary.preRollFrames },
      'Recording started'
    );
  }

  private async writePreRoll(clip: ActiveClip, video: VideoSink, frames: readonly CameraFrame[]) {
    try {
      for (const frame of frames) {
        await video.writeFrame(frame);
        clip.summary.frames += 1;
        clip.summary.preRollFrames += 1;
      }
    } catch (error) {
      clip.video = null;
      clip.summary.videoPath = null;
      await this.failSink(clip, video, 'write', error);
    }
  }

  private async stopClip(): Promise<ClipSummary | null> {
    const clip = this.clip;
    if (!clip) return null;

    for (const deviceId of Array.from(clip.telemetry.keys())) {
      await this.flushDevice(clip, deviceId);
    }

    for (const [deviceId, sink] of clip.telemetry) {
      try {
        await sink.close();
      } catch (error) {
        await this.failSink(clip, sink, 'close', error);
        delete clip.summary.telemetryPaths[deviceId];
      }
    }
    clip.telemetry.clear();

    if (clip.video) {
      const video = clip.video;
      clip.video = null;
      try {
        await video.close();
      } catch (error) {
        await this.failSink(clip, video, 'close', error);
        clip.summary.videoPath = null;
      }
    }

    this.buffers.clear();
    this.clip = null;
    clip.summary.stoppedAt = this.now().getTime();
    this.history.push(clip.summary);
    log.info(
      { token: clip.summary.token, frames: clip.summary.frames, samples: clip.summary.samples },
      'Recording stopped'
    );
    return { ...clip.summary };
  }

  private async flushDevice(clip: ActiveClip, deviceId: string) {
    const buffer = this.buffers.get(deviceId);
    const sink = clip.telemetry.get(deviceId);
    if (!buffer || buffer.length === 0) return;
    this.buffers.set(deviceId, []);
    if (!sink) return;

    try {
      await sink.write(buffer);
      clip.summary.samples[deviceId] = (clip.summary.samples[deviceId] ?? 0) + buffer.length;
    } catch (error) {
      clip.telemetry.delete(deviceId);
      delete clip.summary.telemetryPaths[deviceId];
      await this.failSink(clip, sink, 'write', error);
    }
  }

  private async failSink(
    clip: ActiveClip,
    sink: TelemetrySink | VideoSink,
    stage: SinkFailure['stage'],
    error: unknown
  ) {
    const failure: SinkFailure = {
      token: clip.summary.token,
      sink: sink.path,
      stage,
      error: describeError(error)
    };
    clip.summary.failedSinks.push(sink.path);
    log.error(failure, 'Recording sink failed; excluded from clip');
    this.emit('sink_failed', failure);

    if (stage !== 'close') {
      await sink.close().catch((closeError: unknown) => {
        log.warn({ sink: sink.path, error: describeError(closeError) }, 'Failed sink did not close cleanly');
      });
    }
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.chain.then(operation);
    this.chain = result.catch((error: unknown) => {
      log.error({ error: describeError(error) }, 'Recording operation failed');
    });
    return result;
  }
}
