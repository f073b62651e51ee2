export { ResolutionError, isResolutionError, REFERENCE_HINT } from './errors.js';
export type { ResolutionErrorKind, ResolutionErrorOptions } from './errors.js';
export {
  locateRemoteUrl,
  parseRemoteUrl,
  parseConfigValue,
  cleanPathInput,
  GIT_DIRECTORY_NAME,
  DEFAULT_REMOTE_NAME,
} from './git-config.js';
export type { RemoteLookup, RemoteUrlRecord, AbsentReason, LocateOptions } from './git-config.js';
export {
  parseRepositoryRef,
  formatRepositoryRef,
  createRepositoryRef,
} from './repository-ref.js';
export type { RepositoryRef } from './repository-ref.js';
export { resolveRepository, tryResolveRepository, RESOLUTION_STEPS } from './resolve.js';
export type {
  ResolutionInput,
  ResolutionSource,
  ResolvedRepository,
  ResolveOptions,
} from './resolve.js';
