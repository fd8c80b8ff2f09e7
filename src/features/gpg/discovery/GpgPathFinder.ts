/**
 * GpgPathFinder - locates the gpg executable
 *
 * Search order: configured path, every PATH directory, then the usual install locations.
 * The first hit is remembered for the lifetime of the finder.
 */

import path from 'path';
import { GpgNotFoundError, silentLogger } from '@gpgpipe/core';
import type { IFileSystem, ILogger } from '@gpgpipe/core';

const EXECUTABLE_NAMES = ['gpg', 'gpg2'];

const WINDOWS_INSTALL_DIRS = [
  'C:\\Program Files\\GNU\\GnuPG\\bin',
  'C:\\Program Files (x86)\\GnuPG\\bin',
  'C:\\Program Files\\GNU\\GnuPG',
];

const UNIX_INSTALL_DIRS = ['/usr/local/bin', '/opt/homebrew/bin', '/usr/bin'];

export interface GpgPathFinderOptions {
  /** Explicit executable path, checked before anything else */
  configuredPath?: string;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  logger?: ILogger;
}

export class GpgPathFinder {
  private cached: Promise<string> | null = null;
  private readonly platform: NodeJS.Platform;
  private readonly logger: ILogger;

  constructor(
    private readonly fs: IFileSystem,
    private readonly options: GpgPathFinderOptions = {}
  ) {
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? silentLogger;
  }

  find(): Promise<string> {
    if (!this.cached) {
      this.cached = this.discover();
      // A failed search may succeed later (e.g. after installing gpg)
      void this.cached.catch(() => {
        this.cached = null;
      });
    }
    return this.cached;
  }

  /**
   * Every path checked, in order
   */
  candidates(): string[] {
    const isWindows = this.platform === 'win32';
    const pathApi = isWindows ? path.win32 : path.posix;
    const names = EXECUTABLE_NAMES.map((name) => (isWindows ? `${name}.exe` : name));
    const env = this.options.env ?? process.env;
    const pathValue = (isWindows ? (env.Path ?? env.PATH) : env.PATH) ?? '';

    const searchDirs = pathValue
      .split(isWindows ? ';' : ':')
      .map((dir) => dir.trim())
      .filter((dir) => dir.length > 0);
    const installDirs = isWindows ? WINDOWS_INSTALL_DIRS : UNIX_INSTALL_DIRS;

    const candidates: string[] = [];
    if (this.options.configuredPath) {
      candidates.push(this.options.configuredPath);
    }
    for (const dir of [...searchDirs, ...installDirs]) {
      for (const name of names) {
        const candidate = pathApi.join(dir, name);
        if (!candidates.includes(candidate)) {
          candidates.push(candidate);
        }
      }
    }
    return candidates;
  }

  private async discover(): Promise<string> {
    const candidates = this.candidates();
    for (const candidate of candidates) {
      if (await this.fs.isExecutable(candidate)) {
        this.logger.debug('Found gpg executable', { path: candidate });
        return candidate;
      }
      if (candidate === this.options.configuredPath) {
        this.logger.warn('Configured gpg path is not an executable file; searching PATH', {
          path: candidate,
        });
      }
    }
    throw new GpgNotFoundError(candidates);
  }
}
