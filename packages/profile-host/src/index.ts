/**
 * @jailprof/profile-host
 *
 * jailprof profile host — side-effectful profile lookup and reading.
 * Depends on @jailprof/profile-dsl (the ProfileSource interface); implements
 * it against the filesystem using Node.js built-ins.
 *
 * The profile-dsl package defines the seam; this package provides
 * implementations. No profile-dsl code imports from this package.
 */

// Name completion
export { SHORTNAMES, ProfileNameError, completeName, isProfilePath } from './names.js';

// Search directories with precedence chain
export type { SearchDirOptions } from './locations.js';
export {
  SYSTEM_PROFILE_DIR,
  resolveSearchDirs,
  resolveSystemDir,
  resolveUserDir,
} from './locations.js';

// Lookup
export type { LoadedProfile, LookupOptions, ReadProfileResult } from './lookup.js';
export { ProfileNotFoundError, lookupProfile, readProfile } from './lookup.js';

// ProfileSource implementations
export { FileProfileSource, MemoryProfileSource } from './source.js';

// Logging
export type { CreateLoggerOptions, LogLevel, Logger } from './logger.js';
export {
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
  SILENT_LOGGER,
  createLogger,
  isLogLevel,
  resolveLogLevel,
} from './logger.js';
