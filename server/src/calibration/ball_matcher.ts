import { deprojectPixel, type Intrinsics, type Point3 } from '../camera/types.js';
import type { BallProfile, Hsv } from './ball_profile.js';

// Blobs smaller than this are sensor noise.
const MIN_PIXEL_RADIUS = 3;

export type Blob = {
  u: number;
  v: number;
  pixelRadius: number;
  meanHsv: Hsv;
  depthM: number;
  circularity?: number;
};

export type BallHypothesis = {
  profileId: string;
  name: string;
  position: Point3;
  pixelRadius: number;
  confidence: number;
};

/**
 * Checks one detected blob against one calibrated profile and, when the
 * color band, the projected radius band and the circularity floor all
 * accept it, returns its position in camera space.
 */
export function matchBlob(
  profile: BallProfile,
  blob: Blob,
  intrinsics: Intrinsics | null
): BallHypothesis | null {
  if (blob.pixelRadius < MIN_PIXEL_RADIUS) return null;
  if (!intrinsics || intrinsics.fx <= 0 || blob.depthM <= 0) return null;
  if (!profile.matchesColor(blob.meanHsv)) return null;

  let confidence = 0.5;

  const band = profile.radiusBand();
  if (band) {
    const metricRadius = (blob.pixelRadius * blob.depthM) / intrinsics.fx;
    if (metricRadius < band[0] || metricRadius > band[1]) return null;
    confidence += 0.3;
  }

  if (blob.circularity !== undefined) {
    if (blob.circularity < profile.circularityMin) return null;
    confidence += 0.2;
  }

  return {
    profileId: profile.profileId,
    name: profile.name,
    position: deprojectPixel(intrinsics, blob.u, blob.v, blob.depthM),
    pixelRadius: blob.pixelRadius,
    confidence: Number(confidence.toFixed(2))
  };
}

export function identifyBalls(
  profiles: readonly BallProfile[],
  blobs: readonly Blob[],
  intrinsics: Intrinsics | null
): BallHypothesis[] {
  const hypotheses: BallHypothesis[] = [];
  for (const blob of blobs) {
    let best: BallHypothesis | null = null;
    for (const profile of profiles) {
      const candidate = matchBlob(profile, blob, intrinsics);
      if (candidate && (!best || candidate.confidence > best.confidence)) {
        best = candidate;
      }
    }
    if (best) hypotheses.push(best);
  }
  return hypotheses;
}
