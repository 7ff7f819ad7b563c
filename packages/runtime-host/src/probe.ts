/**
 * DDM Status Runtime Host — System Probe
 *
 * One read of every external signal a status refresh needs. The collector
 * depends on the SystemProbe interface; NodeSystemProbe is the real one.
 */

import { uptime } from 'node:os';
import type { Logger } from 'pino';
import type { DiskSample, Preferences } from '@ddm-status/kernel';
import type { ExecAdapter } from './adapters/exec.js';
import { NodeExecAdapter } from './adapters/exec.js';
import type { HostConfig } from './config.js';
import { isUpdateStaged, readInstallLog, sampleDisk } from './collectors/files.js';
import { readInstalledVersion } from './collectors/os-version.js';
import { loadPreferences } from './collectors/preferences.js';

export interface SystemReadings {
  readonly installedVersion: string;
  readonly logText: string;
  readonly disk: DiskSample;
  readonly uptimeSeconds: number;
  readonly updateStaged: boolean;
  readonly preferences: Preferences;
}

export interface SystemProbe {
  read(): Promise<SystemReadings>;
}

export class NodeSystemProbe implements SystemProbe {
  constructor(
    private readonly config: HostConfig,
    private readonly logger: Logger,
    private readonly exec: ExecAdapter = new NodeExecAdapter(),
    private readonly uptimeFn: () => number = uptime,
  ) {}

  async read(): Promise<SystemReadings> {
    const { sources } = this.config;
    const [installedVersion, logText, disk, updateStaged, loaded] = await Promise.all([
      readInstalledVersion({
        exec: this.exec,
        command: sources.swVersCommand,
        timeoutMs: this.config.execTimeoutMs,
        logger: this.logger,
      }),
      readInstallLog(sources.installLog, this.logger),
      sampleDisk(sources.diskVolume, this.logger),
      isUpdateStaged(sources.stagedUpdateMarker),
      loadPreferences(
        { managedPath: sources.managedPreferences, localPath: sources.localPreferences },
        this.logger,
      ),
    ]);

    this.logger.debug({ source: loaded.source, path: loaded.path }, 'preferences loaded');

    return {
      installedVersion,
      logText,
      disk,
      uptimeSeconds: this.uptimeFn(),
      updateStaged,
      preferences: loaded.preferences,
    };
  }
}
