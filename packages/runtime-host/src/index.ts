/**
 * @ddm-status/runtime-host
 *
 * Side-effectful half of DDM Status: resolves configuration, reads the
 * install log, OS version, disk, uptime and preference files, runs the
 * refresh loop and keeps the status history. All evaluation is delegated
 * to @ddm-status/kernel; no kernel code imports from this package.
 */

// Configuration
export type { ResolveStatusHomeOptions, SourcePaths, SourcePathOverrides } from './home.js';
export {
  PREFERENCE_DOMAIN,
  DEFAULT_SOURCE_PATHS,
  resolveStatusHome,
  resolveSourcePaths,
} from './home.js';
export type { HostConfig, HostConfigOptions, LogLevel } from './config.js';
export { LOG_LEVELS, DEFAULT_LOG_LEVEL, DEFAULT_REFRESH_MINUTES, loadHostConfig } from './config.js';

// Diagnostics
export type { Logger } from './logging/logger.js';
export { createLogger, silentLogger } from './logging/logger.js';

// Subprocesses
export type { ExecAdapter, ExecOptions, ExecResult } from './adapters/exec.js';
export { NodeExecAdapter } from './adapters/exec.js';

// Collectors
export { VERSION_PLACEHOLDER, readInstalledVersion } from './collectors/os-version.js';
export type { OsVersionSource } from './collectors/os-version.js';
export { EMPTY_DISK_SAMPLE, readInstallLog, isUpdateStaged, sampleDisk } from './collectors/files.js';
export type {
  PreferenceLocations,
  PreferenceSource,
  LoadedPreferences,
} from './collectors/preferences.js';
export { loadPreferences, parsePreferences } from './collectors/preferences.js';

// Refresh
export type { SystemProbe, SystemReadings } from './probe.js';
export { NodeSystemProbe } from './probe.js';
export type { StatusCollectorOptions } from './collector.js';
export { StatusCollector } from './collector.js';
export type {
  StatusUpdate,
  StatusListener,
  StatusErrorListener,
  StatusMonitorOptions,
} from './monitor.js';
export { StatusMonitor } from './monitor.js';

// State and history
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';
export type { UlidGenerator } from './logging/ulid.js';
export { ulid, createUlidGenerator } from './logging/ulid.js';
export type { StatusEvent, StatusHistory, StatusHistoryStats } from './logging/status-history.js';
export {
  STATUS_LOG,
  StatusHistorySink,
  readStatusHistory,
  latestEvents,
  toStatusEvent,
} from './logging/status-history.js';
