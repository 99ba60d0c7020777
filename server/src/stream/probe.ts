import { WebSocket, type RawData } from 'ws';
import { TelemetryReassembler } from '../telemetry/reassembler.js';
import type { TelemetrySample } from '../telemetry/types.js';
import type { DeviceEndpoint } from './device_reader.js';

export type ProbeResult = {
  deviceId: string;
  url: string;
  ok: boolean;
  sample: TelemetrySample | null;
  latencyMs: number;
  error: string | null;
};

/** Connects once and waits for a single complete sample, then hangs up. */
export function probeDevice(endpoint: DeviceEndpoint, timeoutMs: number): Promise<ProbeResult> {
  const startedAt = Date.now();
  const reassembler = new TelemetryReassembler();

  return new Promise((resolve) => {
    const ws = new WebSocket(endpoint.url, { handshakeTimeout: timeoutMs });
    let settled = false;

    const finish = (sample: TelemetrySample | null, error: string | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, 'probe complete');
      } else {
        ws.terminate();
      }
      resolve({
        deviceId: endpoint.deviceId,
        url: endpoint.url,
        ok: sample !== null,
        sample,
        latencyMs: Date.now() - startedAt,
        error
      });
    };

    const timer = setTimeout(() => finish(null, `no complete sample within ${timeoutMs}ms`), timeoutMs);

    ws.on('message', (data: RawData) => {
      const sample = reassembler.ingest(endpoint.deviceId, data);
      if (sample) finish(sample, null);
    });
    ws.on('error', (error: Error) => finish(null, error.message));
    ws.on('close', () => finish(null, 'connection closed before a complete sample'));
  });
}
