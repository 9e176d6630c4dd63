/**
 * BuildService - Profile to image, guarded by the lock record
 *
 * `check` answers "is the last successful build still this profile?" without
 * touching anything. `build` regenerates the recipe, runs the engine build
 * and, only once the engine succeeded, records the new digest. A stale lock
 * is reported, never acted on.
 */

import * as os from 'node:os';
import type { ContainerEngine, Profile } from '../config/types.js';
import { digestProfile, shortDigest, type Digest } from '../digest/canonical.js';
import { RuntimeProcessError } from '../errors.js';
import { renderRecipe, writeRecipe, type TemplateSet } from '../generator/ArtifactGenerator.js';
import { LOCK_VERSION, reconcileLock, type LockRecord, type LockState, type LockStore } from '../lock/LockStore.js';
import type { ContainerRuntime } from '../runtime/ContainerRuntime.js';
import type { ILogger } from './Logger.js';

export type RuntimeFactory = (engine: ContainerEngine) => ContainerRuntime;

export interface BuildServiceOptions {
  lockStoreFor: (profileName: string) => LockStore;
  runtimeFor: RuntimeFactory;
  buildDirFor: (profileName: string) => string;
  imageTagFor: (profileName: string) => string;
  templates: TemplateSet;
  logger: ILogger;
  /** Passed to the engine as --build-arg; defaults to the host user's ids */
  buildArgs?: Record<string, string>;
  now?: () => Date;
}

export interface CheckResult {
  state: LockState;
  digest: Digest;
  record: LockRecord | null;
}

export interface BuildOptions {
  /** Build even when the lock is current */
  force?: boolean;
  /** Build without recording the result */
  noLock?: boolean;
}

export type BuildResult =
  | { status: 'up-to-date'; digest: Digest; record: LockRecord }
  | { status: 'built'; digest: Digest; imageTag: string; imageId: string; record: LockRecord | null };

export function hostBuildArgs(): Record<string, string> {
  const { uid, gid } = os.userInfo();
  return uid >= 0 && gid >= 0 ? { USER_UID: String(uid), USER_GID: String(gid) } : {};
}

export class BuildService {
  private readonly logger: ILogger;
  private readonly now: () => Date;

  constructor(private readonly options: BuildServiceOptions) {
    this.logger = options.logger.child({ component: 'BuildService' });
    this.now = options.now ?? (() => new Date());
  }

  check(profileName: string, profile: Profile): CheckResult {
    const digest = digestProfile(profile);
    const record = this.options.lockStoreFor(profileName).load();
    const state = reconcileLock(record, digest);
    this.logger.debug({ profileName, digest: shortDigest(digest), state }, 'Checked lock');
    return { state, digest, record };
  }

  /**
   * Id of the profile's image if the engine has it.
   */
  async imageId(profileName: string, profile: Profile): Promise<string | null> {
    const runtime = this.options.runtimeFor(profile.runtime.engine);
    return runtime.imageId(this.options.imageTagFor(profileName));
  }

  /**
   * Build the profile's image.
   *
   * @throws RuntimeProcessError when the engine build fails; the previous
   *   lock record is left as it was
   */
  async build(profileName: string, profile: Profile, options: BuildOptions = {}): Promise<BuildResult> {
    const { state, digest, record } = this.check(profileName, profile);
    if (!options.force && state === 'current' && record) {
      this.logger.info({ profileName, digest: shortDigest(digest) }, 'Image is up to date, skipping build');
      return { status: 'up-to-date', digest, record };
    }

    const recipe = renderRecipe(profile, { profileName, templates: this.options.templates });
    const contextDir = this.options.buildDirFor(profileName);
    writeRecipe(recipe, contextDir);

    const imageTag = this.options.imageTagFor(profileName);
    const runtime = this.options.runtimeFor(profile.runtime.engine);
    this.logger.info({ profileName, imageTag, contextDir, engine: runtime.engine, previous: state }, 'Building image');

    await runtime.build({
      contextDir,
      tag: imageTag,
      buildArgs: this.options.buildArgs ?? hostBuildArgs(),
    });

    const imageId = await runtime.imageId(imageTag);
    if (imageId === null) {
      throw new RuntimeProcessError(`${runtime.engine} image inspect`, 1, `image ${imageTag} not found after build`);
    }

    if (options.noLock) {
      this.logger.info({ profileName, imageTag, imageId }, 'Built image without recording a lock');
      return { status: 'built', digest, imageTag, imageId, record: null };
    }

    const newRecord: LockRecord = {
      version: LOCK_VERSION,
      digest,
      createdAt: this.now().toISOString(),
      imageTag,
      imageId,
    };
    this.options.lockStoreFor(profileName).save(newRecord);
    this.logger.info({ profileName, imageTag, imageId, digest: shortDigest(digest) }, 'Recorded build lock');
    return { status: 'built', digest, imageTag, imageId, record: newRecord };
  }
}
