import { EventEmitter } from 'events';
import { TelemetryReassembler } from '../telemetry/reassembler.js';
import type { TelemetrySample } from '../telemetry/types.js';
import { DeviceReader, type DeviceEndpoint, type DeviceReaderStatus } from './device_reader.js';
import { SampleQueue } from './sample_queue.js';
import type { BackoffOptions } from './backoff.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('stream_manager');

export type StreamManagerOptions = {
  queueCapacity: number;
  stalePartialMs: number;
  backoff: BackoffOptions;
  shutdownTimeoutMs: number;
  connectTimeoutMs?: number;
};

export type StreamStatus = {
  running: boolean;
  queue: { size: number; capacity: number; dropped: number };
  devices: DeviceReaderStatus[];
};

/**
 * Owns one reader per device and funnels every completed sample into a
 * single bounded queue. `drain()`/`next()` are the recording path's only way
 * in; `latestFor()` peeks for live display without consuming anything.
 */
export class StreamManager extends EventEmitter {
  private readonly options: StreamManagerOptions;
  private readonly reassembler: TelemetryReassembler;
  private readonly queue: SampleQueue;
  private readonly readers = new Map<string, DeviceReader>();
  private readonly latest = new Map<string, TelemetrySample>();
  private evictionTimer: NodeJS.Timeout | null = null;

  constructor(options: StreamManagerOptions) {
    super();
    this.options = options;
    this.reassembler = new TelemetryReassembler({ stalePartialMs: options.stalePartialMs });
    this.queue = new SampleQueue(options.queueCapacity);
  }

  start(endpoints: readonly DeviceEndpoint[]) {
    for (const endpoint of endpoints) {
      if (this.readers.has(endpoint.deviceId)) {
        log.warn({ deviceId: endpoint.deviceId }, 'Device already streaming; skipping');
        continue;
      }
      const reader = new DeviceReader({
        endpoint,
        reassembler: this.reassembler,
        onSample: (sample) => this.accept(sample),
        backoff: this.options.backoff,
        shutdownTimeoutMs: this.options.shutdownTimeoutMs,
        connectTimeoutMs: this.options.connectTimeoutMs
      });
      reader.on('connected', (deviceId: string) => this.emit('connected', deviceId));
      reader.on('disconnected', (deviceId: string) => this.emit('disconnected', deviceId));
      this.readers.set(endpoint.deviceId, reader);
      reader.start();
    }

    if (!this.evictionTimer && this.readers.size > 0) {
      this.evictionTimer = setInterval(() => this.reassembler.evictStale(), this.options.stalePartialMs);
      this.evictionTimer.unref();
    }
    log.info({ devices: endpoints.map((e) => e.deviceId) }, 'Stream manager started');
  }

  deviceIds(): string[] {
    return Array.from(this.readers.keys());
  }

  latestFor(deviceId: string): TelemetrySample | null {
    return this.latest.get(deviceId) ?? null;
  }

  drain(): TelemetrySample[] {
    return this.queue.drain();
  }

  next(timeoutMs?: number): Promise<TelemetrySample | null> {
    return this.queue.next(timeoutMs);
  }

  diagnostics(deviceId: string) {
    return this.reassembler.diagnostics(deviceId);
  }

  status(): StreamStatus {
    return {
      running: this.readers.size > 0,
      queue: { size: this.queue.size, capacity: this.queue.capacity, dropped: this.queue.dropped },
      devices: Array.from(this.readers.values()).map((reader) => reader.status())
    };
  }

  async stop() {
    if (this.evictionTimer) {
      clearInterval(this.evictionTimer);
      this.evictionTimer = null;
    }
    const readers = Array.from(this.readers.values());
    this.readers.clear();
    await Promise.all(readers.map((reader) => reader.stop()));
    this.queue.cancelWaiters();
    log.info({ devices: readers.length }, 'Stream manager stopped');
  }

  private accept(sample: TelemetrySample) {
    this.latest.set(sample.deviceId, sample);
    this.queue.push(sample);
    this.emit('sample', sample);
  }
}

export function endpointsFromIps(params: {
  ips: readonly string[];
  names: readonly string[];
  port: number;
  path: string;
}): DeviceEndpoint[] {
  return params.ips.map((ip, index) => ({
    deviceId: params.names[index] ?? defaultDeviceName(index),
    url: `ws://${ip}:${params.port}${params.path.startsWith('/') ? params.path : `/${params.path}`}`
  }));
}

function defaultDeviceName(index: number): string {
  if (index === 0) return 'left';
  if (index === 1) return 'right';
  return `device${index + 1}`;
}
