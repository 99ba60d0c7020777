import { EventEmitter } from 'events';
import { WebSocket, type RawData } from 'ws';
import type { TelemetryReassembler } from '../telemetry/reassembler.js';
import type { TelemetrySample } from '../telemetry/types.js';
import { calculateBackoff, sleep, type BackoffOptions } from './backoff.js';
import { componentLogger } from '../logger.js';
import { describeError } from '../errors.js';

const log = componentLogger('device_reader');

export type DeviceEndpoint = {
  deviceId: string;
  url: string;
};

export type DeviceReaderState = 'idle' | 'connecting' | 'connected' | 'backoff' | 'stopped';

export type DeviceReaderStatus = {
  deviceId: string;
  url: string;
  state: DeviceReaderState;
  connections: number;
  messages: number;
  samples: number;
  lastError: string | null;
  lastMessageAt: number | null;
};

/**
 * One supervised WebSocket reader per device. It reconnects with
 * exponential backoff until stopped; a failing device never affects the
 * others because every reader owns its own socket and loop.
 */
export class DeviceReader extends EventEmitter {
  readonly endpoint: DeviceEndpoint;
  private readonly reassembler: TelemetryReassembler;
  private readonly onSample: (sample: TelemetrySample) => void;
  private readonly backoff: BackoffOptions;
  private readonly shutdownTimeoutMs: number;
  private readonly connectTimeoutMs: number;

  private socket: WebSocket | null = null;
  private loop: Promise<void> | null = null;
  private abort = new AbortController();
  private state: DeviceReaderState = 'idle';
  private connections = 0;
  private messages = 0;
  private samples = 0;
  private lastError: string | null = null;
  private lastMessageAt: number | null = null;

  constructor(params: {
    endpoint: DeviceEndpoint;
    reassembler: TelemetryReassembler;
    onSample: (sample: TelemetrySample) => void;
    backoff: BackoffOptions;
    shutdownTimeoutMs: number;
    connectTimeoutMs?: number;
  }) {
    super();
    this.endpoint = params.endpoint;
    this.reassembler = params.reassembler;
    this.onSample = params.onSample;
    this.backoff = params.backoff;
    this.shutdownTimeoutMs = params.shutdownTimeoutMs;
    this.connectTimeoutMs = params.connectTimeoutMs ?? 5000;
  }

  start() {
    if (this.loop) return;
    this.abort = new AbortController();
    this.loop = this.run().catch((error: unknown) => {
      this.state = 'stopped';
      this.lastError = describeError(error);
      log.error({ deviceId: this.endpoint.deviceId, error: this.lastError }, 'Device reader crashed');
    });
  }

  async stop() {
    const loop = this.loop;
    if (!loop) return;
    this.abort.abort();

    const socket = this.socket;
    if (socket?.readyState === WebSocket.OPEN) {
      socket.close(1000, 'shutdown');
    } else if (socket?.readyState === WebSocket.CONNECTING) {
      socket.terminate();
    }

    const timeout = new AbortController();
    const finished = await Promise.race([
      loop.then(() => true),
      sleep(this.shutdownTimeoutMs, timeout.signal).then(() => false)
    ]);
    timeout.abort();

    if (!finished) {
      log.warn({ deviceId: this.endpoint.deviceId }, 'Close handshake timed out; terminating socket');
      this.socket?.terminate();
    }
    this.loop = null;
    this.state = 'stopped';
  }

  status(): DeviceReaderStatus {
    return {
      deviceId: this.endpoint.deviceId,
      url: this.endpoint.url,
      state: this.state,
      connections: this.connections,
      messages: this.messages,
      samples: this.samples,
      lastError: this.lastError,
      lastMessageAt: this.lastMessageAt
    };
  }

  private async run() {
    const { signal } = this.abort;
    let attempt = 0;

    while (!signal.aborted) {
      this.state = 'connecting';
      const opened = await this.connectOnce();
      if (signal.aborted) break;

      if (opened) attempt = 0;
      const delay = calculateBackoff(attempt, this.backoff);
      attempt += 1;

      this.state = 'backoff';
      log.warn(
        { deviceId: this.endpoint.deviceId, url: this.endpoint.url, delayMs: delay, error: this.lastError },
        'Device connection lost; retrying'
      );
      await sleep(delay, signal);
    }

    this.state = 'stopped';
  }

  /** Resolves once the socket is closed, with whether it ever opened. */
  private connectOnce(): Promise<boolean> {
    return new Promise((resolve) => {
      const ws = new WebSocket(this.endpoint.url, { handshakeTimeout: this.connectTimeoutMs });
      this.socket = ws;
      let opened = false;

      ws.on('open', () => {
        opened = true;
        this.state = 'connected';
        this.connections += 1;
        this.lastError = null;
        log.info({ deviceId: this.endpoint.deviceId, url: this.endpoint.url }, 'Device connected');
        this.emit('connected', this.endpoint.deviceId);
      });

      ws.on('message', (data: RawData) => {
        this.handleMessage(data);
      });

      ws.on('error', (error: Error) => {
        this.lastError = error.message;
      });

      ws.on('close', () => {
        this.socket = null;
        this.reassembler.reset(this.endpoint.deviceId);
        if (opened) {
          this.emit('disconnected', this.endpoint.deviceId);
        }
        resolve(opened);
      });
    });
  }

  private handleMessage(data: RawData) {
    this.messages += 1;
    this.lastMessageAt = Date.now();
    const sample = this.reassembler.ingest(this.endpoint.deviceId, data);
    if (sample) {
      this.samples += 1;
      this.onSample(sample);
    }
  }
}
