import type { TelemetrySample } from '../telemetry/types.js';
import type { RecordingSessionController } from './controller.js';
import { componentLogger } from '../logger.js';
import { describeError } from '../errors.js';

const log = componentLogger('recording_pump');

export interface SampleSource {
  next(timeoutMs?: number): Promise<TelemetrySample | null>;
  drain(): TelemetrySample[];
}

/**
 * Single consumer between the stream manager's queue and the recorder.
 * Waits for one sample, then takes whatever else is queued as the same batch.
 */
export class RecordingPump {
  private readonly source: SampleSource;
  private readonly controller: RecordingSessionController;
  private readonly pollMs: number;
  private running = false;
  private loop: Promise<void> | null = null;
  private forwarded = 0;

  constructor(params: { source: SampleSource; controller: RecordingSessionController; pollMs?: number }) {
    this.source = params.source;
    this.controller = params.controller;
    this.pollMs = params.pollMs ?? 100;
  }

  get samplesForwarded(): number {
    return this.forwarded;
  }

  start() {
    if (this.loop) return;
    this.running = true;
    this.loop = this.run();
  }

  async stop() {
    this.running = false;
    const loop = this.loop;
    this.loop = null;
    if (loop) await loop;
  }

  private async run() {
    while (this.running) {
      const first = await this.source.next(this.pollMs);
      if (!first) continue;
      const batch = [first, ...this.source.drain()];
      try {
        await this.controller.appendSamples(batch);
        this.forwarded += batch.length;
      } catch (error) {
        log.error({ error: describeError(error), dropped: batch.length }, 'Failed to hand samples to recorder');
      }
    }
  }
}
