import Fastify from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUI from '@fastify/swagger-ui';
import type { StreamManager } from './stream/manager.js';
import type { RecordingSessionController } from './recording/controller.js';
import type { CaptureFeed } from './capture/feed.js';
import type { ProfileStore } from './calibration/profile_store.js';
import { sampleAge, type TelemetrySample } from './telemetry/types.js';
import { componentLogger } from './logger.js';

export type StatusServerDeps = {
  manager: StreamManager;
  controller: RecordingSessionController;
  capture: CaptureFeed;
  profiles?: ProfileStore;
  docs?: boolean;
};

export function buildStatusServer(deps: StatusServerDeps) {
  const fastify = Fastify({ logger: componentLogger('http'), bodyLimit: 5 * 1024 * 1024 });

  if (deps.docs ?? true) {
    fastify.register(swagger, {
      openapi: {
        info: {
          title: 'Jugsense Recorder',
          version: '0.1.0'
        }
      }
    });
    fastify.register(swaggerUI, { routePrefix: '/docs' });
  }

  fastify.get('/health', {
    schema: {
      description: 'Basic health check',
      response: {
        200: {
          type: 'object',
          properties: { ok: { type: 'boolean' } }
        }
      }
    }
  }, async () => ({ ok: true }));

  fastify.get('/status', {
    schema: {
      description: 'Device streams, queue and recording state'
    }
  }, async () => ({
    ok: true,
    streams: deps.manager.status(),
    recording: deps.controller.status(),
    capture: {
      frames: deps.capture.frames,
      rejected: deps.capture.rejectedFrames,
      lastFrameAt: deps.capture.latest()?.timestampMs ?? null
    }
  }));

  fastify.get<{ Querystring: { deviceId?: string } }>('/telemetry/latest', {
    schema: {
      description: 'Most recent sample per device, without consuming the queue',
      querystring: {
        type: 'object',
        properties: { deviceId: { type: 'string' } }
      }
    }
  }, async (request, reply) => {
    const { deviceId } = request.query;
    if (deviceId) {
      const sample = deps.manager.latestFor(deviceId);
      if (!sample) {
        reply.code(404);
        return { error: 'no_sample', deviceId };
      }
      return withAge(sample);
    }
    const latest: Record<string, unknown> = {};
    for (const id of deps.manager.deviceIds()) {
      const sample = deps.manager.latestFor(id);
      latest[id] = sample ? withAge(sample) : null;
    }
    return latest;
  });

  fastify.get('/profiles', {
    schema: {
      description: 'Calibrated ball profiles loaded at startup'
    }
  }, async () => (deps.profiles?.list() ?? []).map((profile) => profile.toRecord()));

  fastify.post('/recording/toggle', {
    schema: {
      description: 'Start a clip when idle, stop it when active'
    }
  }, async () => deps.controller.toggle());

  fastify.post('/frame', {
    schema: {
      description: 'Push one base64 JPEG color frame from the capture bridge'
    }
  }, async (request, reply) => {
    const frame = deps.capture.ingest(request.body);
    if (!frame) {
      reply.code(400);
      return { error: 'invalid_payload' };
    }
    return { ok: true, id: frame.id };
  });

  return fastify;
}

function withAge(sample: TelemetrySample) {
  return { ...sample, ageMs: sampleAge(sample) };
}

export type StatusServer = ReturnType<typeof buildStatusServer>;
