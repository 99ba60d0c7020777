import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'http';
import { ClientMessageSchema, type ErrorMessage, type ServerMessage } from './schemas.js';
import type { RecordingSessionController, RecordingStatus } from '../recording/controller.js';
import type { CaptureFeed } from '../capture/feed.js';
import type { TelemetrySample } from '../telemetry/types.js';
import { componentLogger } from '../logger.js';
import { describeError } from '../errors.js';

const log = componentLogger('ws_hub');

export type WsHub = {
  broadcastSample: (sample: TelemetrySample) => void;
  broadcastState: (status: RecordingStatus) => void;
  emitError: (message: ErrorMessage) => void;
  clientCount: () => number;
  close: () => Promise<void>;
};

/** Live display channel: pushes samples and recording state, takes toggles and frames. */
export function createWsHub(params: {
  server: HttpServer;
  path: string;
  controller: RecordingSessionController;
  capture: CaptureFeed;
}): WsHub {
  const wss = new WebSocketServer({ server: params.server, path: params.path });

  const send = (ws: WebSocket, message: ServerMessage) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  };

  const broadcast = (message: ServerMessage) => {
    for (const client of wss.clients) {
      send(client, message);
    }
  };

  wss.on('connection', (ws) => {
    send(ws, stateMessage(params.controller.status()));

    ws.on('message', async (data) => {
      let parsedMessage: unknown;
      try {
        parsedMessage = JSON.parse(data.toString());
      } catch {
        send(ws, { type: 'error', code: 'invalid_json', message: 'Invalid JSON.' });
        return;
      }

      const result = ClientMessageSchema.safeParse(parsedMessage);
      if (!result.success) {
        send(ws, { type: 'error', code: 'invalid_message', message: 'Message failed validation.' });
        return;
      }

      const message = result.data;
      switch (message.type) {
        case 'toggle_recording': {
          try {
            await params.controller.toggle();
          } catch (error) {
            log.error({ error: describeError(error) }, 'Toggle from display client failed');
            send(ws, { type: 'error', code: 'toggle_failed', message: describeError(error) });
          }
          break;
        }
        case 'video_frame': {
          if (!params.capture.ingest(message)) {
            send(ws, { type: 'error', code: 'invalid_frame', message: 'Frame could not be decoded.' });
          }
          break;
        }
      }
    });
  });

  wss.on('listening', () => {
    log.info({ path: params.path }, 'WebSocket hub listening');
  });

  return {
    broadcastSample: (sample) =>
      broadcast({
        type: 'telemetry_sample',
        deviceId: sample.deviceId,
        accel: sample.accel,
        gyro: sample.gyro,
        accelMagnitude: sample.accelMagnitude,
        gyroMagnitude: sample.gyroMagnitude,
        timestamp: sample.timestamp
      }),
    broadcastState: (status) => broadcast(stateMessage(status)),
    emitError: (message) => broadcast(message),
    clientCount: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) client.terminate();
        wss.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

function stateMessage(status: RecordingStatus): ServerMessage {
  return {
    type: 'recording_state',
    state: status.state,
    token: status.current?.token ?? null,
    sessionDir: status.sessionDir,
    clips: status.clips
  };
}
