import type { TelemetrySample } from '../telemetry/types.js';
import type { StillnessDetector } from '../motion/stillness.js';
import type { RecordingSessionController } from './controller.js';
import { componentLogger } from '../logger.js';
import { describeError } from '../errors.js';

const log = componentLogger('auto_record');

/**
 * Opens a `stillness` clip when the detector fires and closes it again after
 * `clipDurationMs`. With a pre-roll buffer on the controller, the clip starts
 * with the frames of the run that just ended. A clip that is already open
 * (manual or automatic) is left alone.
 */
export class StillnessAutoRecorder {
  private readonly controller: RecordingSessionController;
  private readonly detector: StillnessDetector;
  private readonly clipDurationMs: number;
  private timer: NodeJS.Timeout | null = null;
  private pending: Promise<void> = Promise.resolve();
  private stopped = false;
  private started = 0;

  constructor(params: { controller: RecordingSessionController; detector: StillnessDetector; clipDurationMs: number }) {
    this.controller = params.controller;
    this.detector = params.detector;
    this.clipDurationMs = params.clipDurationMs;
  }

  get clipsStarted(): number {
    return this.started;
  }

  readonly handleSample = (sample: TelemetrySample) => {
    if (this.stopped || !this.detector.update(sample)) return;
    this.pending = this.pending.then(() => this.record()).catch((error: unknown) => {
      log.error({ error: describeError(error) }, 'Stillness clip failed');
    });
  };

  /** Cancels the pending close; an open clip is left for `finalize`. */
  async stop() {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.pending;
  }

  private async record() {
    const status = await this.controller.start('stillness');
    const token = status?.current?.token;
    if (!token) {
      log.info('Stillness detected while a clip is open; not starting another');
      return;
    }
    this.started += 1;
    if (this.stopped) return;
    log.info({ token, clipDurationMs: this.clipDurationMs }, 'Stillness detected; recording');

    this.timer = setTimeout(() => {
      this.timer = null;
      this.pending = this.pending
        .then(() => this.controller.stop(token))
        .then((summary) => {
          if (summary) log.info({ token, frames: summary.frames }, 'Stillness clip closed');
        })
        .catch((error: unknown) => {
          log.error({ error: describeError(error), token }, 'Stillness clip did not close');
        });
    }, this.clipDurationMs);
  }
}
