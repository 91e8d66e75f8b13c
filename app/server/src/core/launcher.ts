import os from 'os';
import path from 'path';
import fs from 'fs';
import { spawn as spawnChild, type SpawnOptions } from 'child_process';
import { NotFoundError } from './errors';
import { logger, sanitize } from './log';
import type { ClientPaths, HostStrategy, LaunchSpec } from '../types/domain';

export interface PlatformLauncher {
  launch(spec: LaunchSpec): void;
}

export interface DetachedChild {
  pid?: number;
  on(event: 'error', cb: (err: Error) => void): unknown;
  unref(): void;
}

export type SpawnFn = (cmd: string, args: string[], options: SpawnOptions) => DetachedChild;

export type Locate = (name: string) => string;

export interface LocateOptions {
  env?: Record<string, string | undefined>;
  platform?: NodeJS.Platform;
}

export type TerminalPreference = 'native' | 'emulator' | 'auto';

export const EMULATOR_BINARY = 'xterm';

function isExecutableFile(p: string): boolean {
  try {
    if (!fs.statSync(p).isFile()) return false;
    fs.accessSync(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** PATH lookup; X11 binaries live outside the default PATH on macOS. */
export function locateExecutable(name: string, opts: LocateOptions = {}): string {
  const env = opts.env ?? process.env;
  const platform = opts.platform ?? os.platform();
  if (name.includes('/')) {
    if (isExecutableFile(name)) return name;
    throw new NotFoundError(name);
  }
  const dirs = (env.PATH || '').split(path.delimiter).filter(Boolean);
  if (platform === 'darwin') dirs.push('/usr/X11/bin');
  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  throw new NotFoundError(name);
}

// ssh is required, telnet is optional (modern macOS ships without it)
export function discoverClients(locate: Locate): ClientPaths {
  const clients: ClientPaths = {};
  try {
    clients.ssh = locate('ssh');
  } catch (e) {
    if (!(e instanceof NotFoundError)) throw e;
    logger.error('discover.ssh_missing', { err: e.message });
  }
  try {
    clients.telnet = locate('telnet');
  } catch (e) {
    if (!(e instanceof NotFoundError)) throw e;
    logger.info('discover.telnet_missing');
  }
  return clients;
}

export function detectHostStrategy(
  platform: NodeJS.Platform,
  locate: Locate,
  preference: TerminalPreference = 'auto',
): HostStrategy {
  const native = preference === 'native' || (preference === 'auto' && platform === 'darwin');
  if (native) return { kind: 'native' };
  return { kind: 'emulator', program: locate(EMULATOR_BINARY) };
}

/**
 * Spawns the terminal detached, without a shell, and forgets about it. The
 * child's exit status is never observed.
 */
export function createLauncher(
  spawn: SpawnFn = (cmd, args, options) => spawnChild(cmd, args, options),
): PlatformLauncher {
  return {
    launch(spec) {
      const child = spawn(spec.program, spec.args, { stdio: 'ignore', detached: true, shell: false });
      child.on('error', (e) => {
        logger.warn('launch.spawn_failed', { program: sanitize(spec.program), err: String(e) });
      });
      child.unref();
      logger.info('launch.spawn', {
        kind: spec.kind,
        program: sanitize(spec.program),
        host: sanitize(spec.hostname),
        pid: child.pid,
      });
    },
  };
}
