import type { AppConfig } from '../config.js';
import type { CliOptions } from './args.js';
import { ProfileStore } from '../calibration/profile_store.js';
import { CaptureFeed } from '../capture/feed.js';
import type { CameraFrame } from '../camera/types.js';
import { createLandmarkDetector, type LandmarkDetector } from '../pose/landmarks.js';
import { RecordingSessionController, type SinkFailure } from '../recording/controller.js';
import { RecordingPump } from '../recording/pump.js';
import { FrameBuffer } from '../recording/frame_buffer.js';
import { StillnessAutoRecorder } from '../recording/auto.js';
import { StillnessDetector } from '../motion/stillness.js';
import { StreamManager, endpointsFromIps } from '../stream/manager.js';
import { buildStatusServer } from '../server.js';
import { createWsHub } from '../ws/hub.js';
import { StartupError, describeError } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('record');

export type RecordingRuntime = {
  controller: RecordingSessionController;
  manager: StreamManager;
  shutdown: () => Promise<void>;
};

/**
 * Recording mode: manual toggles, plus the stillness trigger when enabled.
 * Brings up the status server first so the capture bridge can start posting
 * frames, checks the camera, then starts the device streams and the recorder.
 */
export async function startRecording(
  cfg: AppConfig,
  options: CliOptions,
  attachments: { detector?: LandmarkDetector } = {}
): Promise<RecordingRuntime> {
  const ips = options.ips.length > 0 ? options.ips : cfg.deviceIps;
  if (ips.length === 0) {
    throw new StartupError(
      'no_devices',
      'No device addresses configured',
      'Set DEVICE_IPS in .env or pass --ip <addr> once per watch.'
    );
  }

  const profiles = await ProfileStore.open(cfg.profilesDir);
  const detector = createLandmarkDetector(attachments.detector);
  const endpoints = endpointsFromIps({
    ips,
    names: cfg.deviceNames,
    port: cfg.imuPort,
    path: cfg.imuPath
  });

  const manager = new StreamManager({
    queueCapacity: cfg.queueCapacity,
    stalePartialMs: cfg.stalePartialMs,
    backoff: { baseDelayMs: cfg.reconnectBaseMs, maxDelayMs: cfg.reconnectMaxMs },
    shutdownTimeoutMs: cfg.shutdownTimeoutMs
  });
  const controller = new RecordingSessionController({
    outputDir: cfg.outputDir,
    devices: () => manager.deviceIds(),
    videoExt: cfg.videoExt,
    preRoll: cfg.preRollMs > 0 ? new FrameBuffer({ maxDurationMs: cfg.preRollMs }) : undefined
  });
  const capture = new CaptureFeed(options.camera ?? 0);
  const pump = new RecordingPump({ source: manager, controller });
  const auto = cfg.autoRecord
    ? new StillnessAutoRecorder({
        controller,
        detector: new StillnessDetector({
          motionThreshold: cfg.motionThreshold,
          stillnessThreshold: cfg.stillnessThreshold,
          stillnessDurationMs: cfg.stillnessDurationMs
        }),
        clipDurationMs: cfg.autoClipMs
      })
    : null;

  const app = buildStatusServer({ manager, controller, capture, profiles });
  const hub = createWsHub({ server: app.server, path: cfg.wsPath, controller, capture });

  manager.on('sample', hub.broadcastSample);
  if (auto) manager.on('sample', auto.handleSample);
  controller.on('state', hub.broadcastState);
  controller.on('sink_failed', (failure: SinkFailure) => {
    hub.emitError({ type: 'error', code: 'sink_failed', message: `${failure.sink}: ${failure.error}` });
  });
  capture.on('frame', (frame: CameraFrame) => {
    controller.appendFrame(frame).catch((error: unknown) => {
      log.error({ error: describeError(error) }, 'Frame not recorded');
    });
  });

  await app.listen({ port: cfg.port, host: cfg.host });

  const closeServer = async () => {
    await hub.close();
    await app.close();
  };

  if (!options.noCamera) {
    log.info({ camera: capture.camera, timeoutMs: cfg.captureTimeoutMs }, 'Waiting for the first capture frame');
    try {
      await capture.waitForFrame(cfg.captureTimeoutMs);
    } catch (error) {
      await closeServer();
      throw error;
    }
  }

  manager.start(endpoints);
  pump.start();
  log.info(
    {
      devices: endpoints.map((e) => e.url),
      profiles: profiles.list().length,
      pose: detector.mode,
      camera: options.noCamera ? null : capture.camera,
      sessionDir: controller.sessionDir,
      autoRecord: cfg.autoRecord,
      preRollMs: cfg.preRollMs
    },
    'Recording mode ready; toggle with POST /recording/toggle or a toggle_recording message'
  );

  let stopping: Promise<void> | null = null;
  const shutdown = () => {
    stopping ??= (async () => {
      await manager.stop();
      await pump.stop();
      await auto?.stop();
      const clip = await controller.finalize();
      if (clip) log.info({ token: clip.token }, 'Open clip closed during shutdown');
      await closeServer();
    })();
    return stopping;
  };

  return { controller, manager, shutdown };
}
