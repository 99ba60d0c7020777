import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { BallProfile } from './ball_profile.js';
import { componentLogger } from '../logger.js';
import { describeError } from '../errors.js';

const log = componentLogger('profile_store');

export const PROFILES_FILENAME = 'ball_profiles.json';

export class ProfileStore {
  private profiles: BallProfile[] = [];
  readonly filePath: string;

  constructor(configDir: string) {
    this.filePath = path.resolve(configDir, PROFILES_FILENAME);
  }

  static async open(configDir: string): Promise<ProfileStore> {
    const store = new ProfileStore(configDir);
    await store.load();
    return store;
  }

  add(profile: BallProfile) {
    this.profiles = this.profiles.filter((p) => p.profileId !== profile.profileId);
    this.profiles.push(profile);
    log.info({ profile: profile.name, profileId: profile.profileId }, 'Added profile');
  }

  remove(profileId: string): boolean {
    const before = this.profiles.length;
    this.profiles = this.profiles.filter((p) => p.profileId !== profileId);
    return this.profiles.length !== before;
  }

  get(profileId: string): BallProfile | undefined {
    return this.profiles.find((p) => p.profileId === profileId);
  }

  list(): BallProfile[] {
    return [...this.profiles];
  }

  async save() {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const records = this.profiles.map((p) => p.toRecord());
    await fs.writeFile(this.filePath, `${JSON.stringify(records, null, 2)}\n`, 'utf8');
    log.info({ count: records.length, path: this.filePath }, 'Saved ball profiles');
  }

  async load() {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        log.info({ path: this.filePath }, 'Profile file not found; no profiles loaded');
        this.profiles = [];
        return;
      }
      throw error;
    }

    try {
      const records = z.array(z.unknown()).parse(JSON.parse(text));
      this.profiles = records.map((record) => BallProfile.fromRecord(record));
      log.info({ count: this.profiles.length, path: this.filePath }, 'Loaded ball profiles');
    } catch (error) {
      this.profiles = [];
      log.warn({ path: this.filePath, error: describeError(error) }, 'Profile file unreadable; profiles reset');
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
