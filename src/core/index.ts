// Core module exports for channel-mirror

// Lock file
export { loadLockfile, parseLockfile, parseCondaFilename, selectRecords, SUPPORTED_LOCKFILE_VERSION } from './lockfile/pixiLockParser';
export type { RecordSelection } from './lockfile/pixiLockParser';

// Channel layout
export { toChannelPath, resolveChannelPath, resolveStagingPath, planChannel, STAGING_DIR_NAME } from './mirror/channelLayout';
export type { ChannelPlan, PlannedRecord } from './mirror/channelLayout';

// Integrity
export { computeFileHash, verifyFile } from './mirror/integrityVerifier';
export type { VerifyOutcome, VerifyResult, VerifyOptions } from './mirror/integrityVerifier';

// Fetcher
export { HttpArtifactFetcher, classifyRequestError } from './mirror/artifactFetcher';
export type { ArtifactFetcher, FetchRequest, FetchResult, HttpFetcherOptions } from './mirror/artifactFetcher';

// Download Coordinator
export { DownloadCoordinator } from './mirror/downloadCoordinator';
export type { CoordinatorOptions, DownloadCoordinatorEvents, OverallProgress } from './mirror/downloadCoordinator';

// Report
export { buildMirrorReport, formatMirrorReport, formatBytes, formatDuration, EXIT_CANCELLED } from './mirror/mirrorReporter';
export type { MirrorReport, MirrorFailureReport } from './mirror/mirrorReporter';

// Publisher
export { CommandPublisher, RecordingPublisher, expandRootPlaceholders, splitCommandLine } from './publisher';
export type { Publisher, CommandPublisherOptions, PublishCall } from './publisher';

// Mirror flow
export { mirrorChannel, verifyChannel, sweepStaging, ensureMirrorRoot } from './channelMirror';
export type { MirrorChannelOptions, MirrorChannelResult, PublishFailure, VerifyChannelOptions, VerifyChannelResult, VerifiedRecord } from './channelMirror';

// Errors
export {
  MirrorError,
  ParseError,
  PathCollisionError,
  NetworkError,
  HashMismatchError,
  FilesystemError,
  isMirrorError,
} from './errors';

// Config
export { ConfigManager, getConfigManager, DEFAULT_CONFIG } from './config';
export type { Config, ConfigKey, LogLevel } from './config';

export type * from '../types';
