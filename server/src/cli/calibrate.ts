import type { AppConfig } from '../config.js';
import type { CliOptions } from './args.js';
import type { BallProfile } from '../calibration/ball_profile.js';
import { ProfileStore } from '../calibration/profile_store.js';
import { profileFromSamples, readCalibrationSamples } from '../calibration/sample_file.js';
import { StartupError } from '../errors.js';
import { componentLogger } from '../logger.js';

const log = componentLogger('calibrate');

export async function runCalibration(cfg: AppConfig, options: CliOptions): Promise<BallProfile> {
  if (!options.samples) {
    throw new StartupError('missing_samples', 'No calibration sample file given', 'Pass --samples <file>.');
  }

  const samples = await readCalibrationSamples(options.samples);
  const profile = profileFromSamples(samples, options.name);
  if (!profile.isCalibrated()) {
    throw new StartupError(
      'calibration_failed',
      `No color model could be built from ${options.samples}`,
      'Capture the ball again with more of its surface inside the selection.'
    );
  }

  const store = await ProfileStore.open(cfg.profilesDir);
  store.add(profile);
  await store.save();

  log.info(
    {
      profile: profile.name,
      profileId: profile.profileId,
      hsvLow: profile.hsvLow,
      hsvHigh: profile.hsvHigh,
      radiusM: profile.realWorldRadiusM,
      path: store.filePath
    },
    'Ball profile calibrated'
  );
  return profile;
}
