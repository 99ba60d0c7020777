import { z } from 'zod';
import { FrameSchema } from '../capture/feed.js';

export const ToggleRecordingSchema = z.object({
  type: z.literal('toggle_recording')
});

export const VideoFrameSchema = FrameSchema.extend({
  type: z.literal('video_frame')
});

export const ClientMessageSchema = z.discriminatedUnion('type', [ToggleRecordingSchema, VideoFrameSchema]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

const Vector3Schema = z.object({ x: z.number(), y: z.number(), z: z.number() });

export const TelemetrySampleMessageSchema = z.object({
  type: z.literal('telemetry_sample'),
  deviceId: z.string().min(1),
  accel: Vector3Schema,
  gyro: Vector3Schema,
  accelMagnitude: z.number(),
  gyroMagnitude: z.number(),
  timestamp: z.number()
});

export const RecordingStateSchema = z.object({
  type: z.literal('recording_state'),
  state: z.enum(['idle', 'active']),
  token: z.string().nullable(),
  sessionDir: z.string(),
  clips: z.number().int().nonnegative()
});

export const ErrorSchema = z.object({
  type: z.literal('error'),
  code: z.string().min(1),
  message: z.string().min(1)
});

export type TelemetrySampleMessage = z.infer<typeof TelemetrySampleMessageSchema>;
export type RecordingStateMessage = z.infer<typeof RecordingStateSchema>;
export type ErrorMessage = z.infer<typeof ErrorSchema>;

export type ServerMessage = TelemetrySampleMessage | RecordingStateMessage | ErrorMessage;
