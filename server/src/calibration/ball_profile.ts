import crypto from 'crypto';
import { z } from 'zod';
import { componentLogger } from '../logger.js';
import type { Intrinsics } from '../camera/types.js';

const log = componentLogger('ball_profile');

export type Hsv = [number, number, number];

const HSV_MIN: Hsv = [0, 0, 0];
const HSV_MAX: Hsv = [179, 255, 255];

export const DEFAULT_STD_MULTIPLIER = 2.0;
export const DEFAULT_RADIUS_CONFIDENCE = 1.5;
export const DEFAULT_CIRCULARITY_MIN = 0.7;
// Floor for the saturation and value lower bounds.
export const MIN_SATURATION_VALUE = 30;

const HsvSchema = z.tuple([z.number(), z.number(), z.number()]);

export const BallProfileRecordSchema = z.object({
  profile_id: z.string().min(1),
  name: z.string().default('Unnamed Ball'),
  hsv_mean: HsvSchema.nullable().default(null),
  hsv_std: HsvSchema.nullable().default(null),
  hsv_low: HsvSchema.nullable().default(null),
  hsv_high: HsvSchema.nullable().default(null),
  std_multiplier: z.number().positive().default(DEFAULT_STD_MULTIPLIER),
  real_world_radius_m: z.number().nullable().default(null),
  radius_confidence_factor: z.number().positive().default(DEFAULT_RADIUS_CONFIDENCE),
  calibration_depth_m: z.number().nullable().default(null),
  circularity_min: z.number().min(0).max(1).default(DEFAULT_CIRCULARITY_MIN),
  raw_hsv_values: z.array(HsvSchema).default([]),
  raw_depth_values: z.array(z.number()).default([])
});

export type BallProfileRecord = z.infer<typeof BallProfileRecordSchema>;

export class BallProfile {
  readonly profileId: string;
  name: string;

  hsvMean: Hsv | null = null;
  hsvStd: Hsv | null = null;
  hsvLow: Hsv | null = null;
  hsvHigh: Hsv | null = null;
  readonly stdMultiplier: number;

  realWorldRadiusM: number | null = null;
  radiusConfidenceFactor = DEFAULT_RADIUS_CONFIDENCE;
  calibrationDepthM: number | null = null;
  circularityMin = DEFAULT_CIRCULARITY_MIN;

  rawHsvValues: Hsv[] = [];
  rawDepthValues: number[] = [];

  constructor(params: { profileId?: string; name?: string; stdMultiplier?: number } = {}) {
    this.profileId = params.profileId ?? crypto.randomUUID();
    this.name = params.name ?? 'Unnamed Ball';
    this.stdMultiplier = params.stdMultiplier ?? DEFAULT_STD_MULTIPLIER;
  }

  /**
   * Derives the HSV band from calibration pixels: mean ± k·std per channel,
   * clamped to the OpenCV HSV ranges, with the S and V lower bounds floored
   * so near-black or washed-out pixels never match.
   */
  setColorCharacteristics(samples: readonly Hsv[]) {
    if (samples.length === 0) {
      log.warn({ profileId: this.profileId }, 'No HSV values provided; color model left unset');
      return;
    }

    const mean = channelMean(samples);
    const std = channelStd(samples, mean);
    const k = this.stdMultiplier;

    const low = mapHsv((c) => Math.floor(clamp(mean[c] - k * std[c], HSV_MIN[c], HSV_MAX[c])));
    const high = mapHsv((c) => Math.ceil(clamp(mean[c] + k * std[c], HSV_MIN[c], HSV_MAX[c])));
    low[1] = Math.max(low[1], MIN_SATURATION_VALUE);
    low[2] = Math.max(low[2], MIN_SATURATION_VALUE);

    this.rawHsvValues = samples.map((sample) => [...sample]);
    this.hsvMean = mean;
    this.hsvStd = std;
    this.hsvLow = low;
    this.hsvHigh = high;
  }

  setSizeCharacteristics(pixelRadius: number, depthM: number, intrinsics: Intrinsics | null | undefined) {
    if (!intrinsics || depthM <= 0 || intrinsics.fx <= 0) {
      log.warn(
        { profileId: this.profileId, depthM, hasIntrinsics: Boolean(intrinsics) },
        'Cannot set size: missing intrinsics or invalid depth'
      );
      this.realWorldRadiusM = null;
      return;
    }

    this.realWorldRadiusM = (pixelRadius * depthM) / intrinsics.fx;
    this.calibrationDepthM = depthM;
    log.info(
      { profile: this.name, radiusM: this.realWorldRadiusM, depthM },
      'Estimated 3D radius'
    );
  }

  setDepthCharacteristics(depthValues: readonly number[]) {
    if (depthValues.length === 0) {
      log.warn({ profileId: this.profileId }, 'No depth values provided');
      return;
    }
    this.rawDepthValues = [...depthValues];
  }

  isCalibrated(): boolean {
    return this.hsvLow !== null && this.hsvHigh !== null;
  }

  /** Acceptance band for the metric radius, or null before size calibration. */
  radiusBand(): [number, number] | null {
    if (this.realWorldRadiusM === null) return null;
    return [
      this.realWorldRadiusM / this.radiusConfidenceFactor,
      this.realWorldRadiusM * this.radiusConfidenceFactor
    ];
  }

  matchesColor(hsv: Hsv): boolean {
    const low = this.hsvLow;
    const high = this.hsvHigh;
    if (!low || !high) return false;
    return hsv.every((value, c) => value >= low[c] && value <= high[c]);
  }

  toRecord(): BallProfileRecord {
    return {
      profile_id: this.profileId,
      name: this.name,
      hsv_mean: copyHsv(this.hsvMean),
      hsv_std: copyHsv(this.hsvStd),
      hsv_low: copyHsv(this.hsvLow),
      hsv_high: copyHsv(this.hsvHigh),
      std_multiplier: this.stdMultiplier,
      real_world_radius_m: this.realWorldRadiusM,
      radius_confidence_factor: this.radiusConfidenceFactor,
      calibration_depth_m: this.calibrationDepthM,
      circularity_min: this.circularityMin,
      raw_hsv_values: this.rawHsvValues.map((sample) => [...sample]),
      raw_depth_values: [...this.rawDepthValues]
    };
  }

  static fromRecord(input: unknown): BallProfile {
    const record = BallProfileRecordSchema.parse(input);
    const profile = new BallProfile({
      profileId: record.profile_id,
      name: record.name,
      stdMultiplier: record.std_multiplier
    });
    profile.hsvMean = record.hsv_mean;
    profile.hsvStd = record.hsv_std;
    profile.hsvLow = record.hsv_low;
    profile.hsvHigh = record.hsv_high;
    profile.realWorldRadiusM = record.real_world_radius_m;
    profile.radiusConfidenceFactor = record.radius_confidence_factor;
    profile.calibrationDepthM = record.calibration_depth_m;
    profile.circularityMin = record.circularity_min;
    profile.rawHsvValues = record.raw_hsv_values;
    profile.rawDepthValues = record.raw_depth_values;
    return profile;
  }
}

function mapHsv(fn: (channel: 0 | 1 | 2) => number): Hsv {
  return [fn(0), fn(1), fn(2)];
}

function channelMean(samples: readonly Hsv[]): Hsv {
  return mapHsv((c) => samples.reduce((sum, sample) => sum + sample[c], 0) / samples.length);
}

function channelStd(samples: readonly Hsv[], mean: Hsv): Hsv {
  return mapHsv((c) =>
    Math.sqrt(samples.reduce((sum, sample) => sum + (sample[c] - mean[c]) ** 2, 0) / samples.length)
  );
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function copyHsv(value: Hsv | null): Hsv | null {
  return value ? [...value] : null;
}
