import { z } from 'zod';

export type AxisGroup = 'accel' | 'gyro' | 'mag';

const GROUP_NAMES = [
  'accel',
  'acceleration',
  'accelerometer',
  'gyro',
  'rotation',
  'gyroscope',
  'mag',
  'magnetometer'
] as const;

const GROUP_ALIASES: Record<(typeof GROUP_NAMES)[number], AxisGroup> = {
  accel: 'accel',
  acceleration: 'accel',
  accelerometer: 'accel',
  gyro: 'gyro',
  rotation: 'gyro',
  gyroscope: 'gyro',
  mag: 'mag',
  magnetometer: 'mag'
};

export const DeviceMessageSchema = z.object({
  type: z.enum(GROUP_NAMES).transform((name) => GROUP_ALIASES[name]),
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
  timestamp_ns: z.number().nonnegative().optional(),
  watch_id: z.string().min(1).optional()
});

export type DeviceMessage = z.infer<typeof DeviceMessageSchema>;
