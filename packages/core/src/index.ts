/**
 * @kiln/core - Profile model, digest, lock reconciliation, recipe
 * generation, command resolution and container registry
 */

// Errors
export * from './errors.js';

// Config model
export type * from './config/types.js';
export { DEFAULT_APT_PACKAGES, DEFAULT_BASE_IMAGE, createDefaultCommandTable, createDefaultProfile } from './config/defaults.js';
export {
  ProfileDocumentSchema,
  formatIssues,
  fromProfileDocument,
  toProfileDocument,
  type CommandEntryDocument,
  type ProfileDocument,
  type ProfileDocumentInput,
} from './config/schema.js';
export {
  DEFAULT_PROFILE_NAME,
  FileProfileStore,
  isValidProfileName,
  parseProfile,
  profileFromDocument,
  serializeProfile,
  type IProfileStore,
} from './config/ProfileStore.js';

// Digest
export * from './digest/canonical.js';

// Lock
export * from './lock/LockStore.js';

// Generator
export * from './generator/ArtifactGenerator.js';

// Commands
export * from './commands/CommandResolver.js';

// Registry and paths
export * from './registry/identity.js';
export * from './registry/RegistryStore.js';
export * from './registry/ProjectIndex.js';
export * from './paths/expand.js';
export * from './paths/KilnPaths.js';

// Runtime
export * from './runtime/ProcessRunner.js';
export * from './runtime/ContainerRuntime.js';

// Settings
export * from './settings/Settings.js';

// Services
export * from './services/Logger.js';
export * from './services/BuildService.js';
export * from './services/ContainerService.js';

// Filesystem
export * from './fs/atomicWrite.js';
