import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { once } from 'events';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import Fastify, { type FastifyInstance } from 'fastify';
import { WebSocket } from 'ws';
import { createWsHub, type WsHub } from './hub.js';
import { RecordingSessionController, type RecordingStatus } from '../recording/controller.js';
import { CaptureFeed } from '../capture/feed.js';

describe('ws hub', () => {
  let outputDir: string;
  let app: FastifyInstance;
  let hub: WsHub;
  let controller: RecordingSessionController;
  let capture: CaptureFeed;
  let client: WebSocket;
  let received: unknown[];

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hub-'));
    controller = new RecordingSessionController({ outputDir, devices: () => [] });
    capture = new CaptureFeed();
    app = Fastify();
    hub = createWsHub({ server: app.server, path: '/ws', controller, capture });
    controller.on('state', (status: RecordingStatus) => hub.broadcastState(status));
    await app.listen({ port: 0, host: '127.0.0.1' });

    const address = app.server.address();
    if (!address || typeof address === 'string') throw new Error('expected a TCP address');
    received = [];
    client = new WebSocket(`ws://127.0.0.1:${address.port}/ws`);
    client.on('message', (data) => received.push(JSON.parse(data.toString())));
    await once(client, 'open');
  });

  afterEach(async () => {
    client.close();
    await controller.finalize();
    await hub.close();
    await app.close();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('greets new clients with the recording state', async () => {
    await vi.waitFor(() => expect(received).toHaveLength(1));
    expect(received[0]).toEqual({
      type: 'recording_state',
      state: 'idle',
      token: null,
      sessionDir: controller.sessionDir,
      clips: 0
    });
  });

  it('toggles recording on request and broadcasts the new state', async () => {
    client.send(JSON.stringify({ type: 'toggle_recording' }));

    await vi.waitFor(() => expect(received).toHaveLength(2));
    expect(received[1]).toMatchObject({ type: 'recording_state', state: 'active' });
    expect(controller.state).toBe('active');
  });

  it('feeds video frames into the capture feed', async () => {
    const image_base64 = Buffer.from('jpeg').toString('base64');
    client.send(JSON.stringify({ type: 'video_frame', image_base64, ts_ms: 9 }));

    await vi.waitFor(() => expect(capture.frames).toBe(1));
    expect(capture.latest()?.colorJpeg.toString()).toBe('jpeg');
  });

  it('answers malformed messages with an error', async () => {
    client.send('not json');
    client.send(JSON.stringify({ type: 'start_session' }));

    await vi.waitFor(() => expect(received).toHaveLength(3));
    expect(received.slice(1)).toEqual([
      { type: 'error', code: 'invalid_json', message: 'Invalid JSON.' },
      { type: 'error', code: 'invalid_message', message: 'Message failed validation.' }
    ]);
  });

  it('broadcasts telemetry samples', async () => {
    await vi.waitFor(() => expect(hub.clientCount()).toBe(1));
    hub.broadcastSample({
      deviceId: 'left',
      accel: { x: 1, y: 2, z: 3 },
      gyro: { x: 0, y: 0, z: 0 },
      accelMagnitude: Math.sqrt(14),
      gyroMagnitude: 0,
      timestamp: 1000,
      receivedAt: 1004,
      pairingSkewMs: 4
    });

    await vi.waitFor(() => expect(received).toHaveLength(2));
    expect(received[1]).toEqual({
      type: 'telemetry_sample',
      deviceId: 'left',
      accel: { x: 1, y: 2, z: 3 },
      gyro: { x: 0, y: 0, z: 0 },
      accelMagnitude: Math.sqrt(14),
      gyroMagnitude: 0,
      timestamp: 1000
    });
  });
});
