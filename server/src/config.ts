import { z } from 'zod';
import { loadEnv } from './load_env.js';

const commaList = z
  .string()
  .default('')
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

export const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8090),
  HOST: z.string().default('0.0.0.0'),
  WS_PATH: z.string().default('/ws'),
  DEVICE_IPS: commaList,
  DEVICE_NAMES: commaList,
  IMU_PORT: z.coerce.number().int().min(1).max(65535).default(8081),
  IMU_PATH: z.string().default('/imu'),
  QUEUE_CAPACITY: z.coerce.number().int().min(1).default(100),
  STALE_PARTIAL_MS: z.coerce.number().int().positive().default(1000),
  RECONNECT_BASE_MS: z.coerce.number().int().positive().default(500),
  RECONNECT_MAX_MS: z.coerce.number().int().positive().default(5000),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  OUTPUT_DIR: z.string().default('recordings'),
  PROFILES_DIR: z.string().default('config'),
  VIDEO_EXT: z.string().regex(/^[a-z0-9]+$/).default('mjpeg'),
  CAPTURE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  AUTO_RECORD: z.enum(['true', 'false']).default('false').transform((value) => value === 'true'),
  MOTION_THRESHOLD: z.coerce.number().positive().default(3),
  STILLNESS_THRESHOLD: z.coerce.number().nonnegative().default(0.5),
  STILLNESS_DURATION_MS: z.coerce.number().int().positive().default(3000),
  AUTO_CLIP_MS: z.coerce.number().int().positive().default(2000),
  PRE_ROLL_MS: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export type AppConfig = ReturnType<typeof toConfig>;

function toConfig(env: z.infer<typeof envSchema>) {
  return {
    port: env.PORT,
    host: env.HOST,
    wsPath: env.WS_PATH,
    deviceIps: env.DEVICE_IPS,
    deviceNames: env.DEVICE_NAMES,
    imuPort: env.IMU_PORT,
    imuPath: env.IMU_PATH,
    queueCapacity: env.QUEUE_CAPACITY,
    stalePartialMs: env.STALE_PARTIAL_MS,
    reconnectBaseMs: env.RECONNECT_BASE_MS,
    reconnectMaxMs: env.RECONNECT_MAX_MS,
    shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
    outputDir: env.OUTPUT_DIR,
    profilesDir: env.PROFILES_DIR,
    videoExt: env.VIDEO_EXT,
    captureTimeoutMs: env.CAPTURE_TIMEOUT_MS,
    autoRecord: env.AUTO_RECORD,
    motionThreshold: env.MOTION_THRESHOLD,
    stillnessThreshold: env.STILLNESS_THRESHOLD,
    stillnessDurationMs: env.STILLNESS_DURATION_MS,
    autoClipMs: env.AUTO_CLIP_MS,
    preRollMs: env.PRE_ROLL_MS,
    logLevel: env.LOG_LEVEL
  };
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    console.error('Invalid environment variables', parsed.error.format());
    throw new Error('Invalid environment');
  }

  return toConfig(parsed.data);
}

loadEnv();

export const config = parseConfig(process.env);
