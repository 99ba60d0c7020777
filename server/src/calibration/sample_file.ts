import fs from 'fs/promises';
import { z } from 'zod';
import { IntrinsicsSchema } from '../camera/types.js';
import { BallProfile } from './ball_profile.js';

// What a calibration capture leaves on disk: pixels inside the user's
// selection, the selection radius and the depth under it.
export const CalibrationSamplesSchema = z.object({
  name: z.string().min(1).optional(),
  hsv: z.array(z.tuple([z.number(), z.number(), z.number()])).min(1),
  pixelRadius: z.number().positive().optional(),
  depthM: z.number().optional(),
  depthValues: z.array(z.number()).default([]),
  intrinsics: IntrinsicsSchema.nullable().default(null)
});

export type CalibrationSamples = z.infer<typeof CalibrationSamplesSchema>;

export async function readCalibrationSamples(filePath: string): Promise<CalibrationSamples> {
  const text = await fs.readFile(filePath, 'utf8');
  return CalibrationSamplesSchema.parse(JSON.parse(text));
}

export function profileFromSamples(samples: CalibrationSamples, name?: string): BallProfile {
  const profile = new BallProfile({ name: name ?? samples.name });
  profile.setColorCharacteristics(samples.hsv);
  if (samples.pixelRadius !== undefined && samples.depthM !== undefined) {
    profile.setSizeCharacteristics(samples.pixelRadius, samples.depthM, samples.intrinsics);
  }
  if (samples.depthValues.length > 0) {
    profile.setDepthCharacteristics(samples.depthValues);
  }
  return profile;
}
