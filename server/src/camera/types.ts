import { z } from 'zod';

export const IntrinsicsSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  fx: z.number(),
  fy: z.number(),
  ppx: z.number(),
  ppy: z.number()
});

/** Pinhole parameters of the aligned color/depth stream, in pixels. */
export type Intrinsics = z.infer<typeof IntrinsicsSchema>;

export type Point3 = { x: number; y: number; z: number };

export type CameraFrame = {
  id: string;
  camera: number;
  timestampMs: number;
  colorJpeg: Buffer;
};

export function deprojectPixel(intrinsics: Intrinsics, u: number, v: number, depthM: number): Point3 {
  return {
    x: ((u - intrinsics.ppx) * depthM) / intrinsics.fx,
    y: ((v - intrinsics.ppy) * depthM) / intrinsics.fy,
    z: depthM
  };
}
