import { toNativeColor, toXtermColor } from './color';
import { NotFoundError } from './errors';
import type {
  Appearance,
  ClientPaths,
  ConnectionSpec,
  EmulatorLaunchSpec,
  HostStrategy,
  LaunchSpec,
  NativeLaunchSpec,
} from '../types/domain';

export const NATIVE_PROGRAM = 'osascript';

// Family handed to the emulator's font flag as mono-<size>
export const EMULATOR_FONT_FAMILY = 'mono';

/** Escapes text for a double-quoted AppleScript string literal. */
export function escapeScriptString(s: string): string {
  return s.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

export function parseGeometry(geometry: string): { columns: number; rows: number } {
  const [cols, rows] = geometry.split('x');
  return { columns: Number(cols), rows: Number(rows) };
}

/**
 * The client invocation run inside the terminal. Nothing here is
 * shell-quoted: hostnames and ports are validated upstream and key paths
 * come from a file picker.
 */
export function buildRemoteCommand(conn: ConnectionSpec, keyPath: string, clients: ClientPaths): string {
  if (conn.protocol === 'telnet') {
    if (!clients.telnet) throw new NotFoundError('telnet');
    return `${clients.telnet} ${conn.hostname} ${conn.port}`;
  }
  if (!clients.ssh) throw new NotFoundError('ssh');
  const key = keyPath ? ` -i ${keyPath}` : '';
  return `${clients.ssh} -p ${conn.port}${key} ${conn.username}@${conn.hostname}`;
}

export function renderAppleScript(spec: NativeLaunchSpec): string {
  const list = (c: [number, number, number]) => `{${c.join(', ')}}`;
  const settings = 'current settings of selected tab of targetWindow';
  return [
    '',
    'tell application "Terminal"',
    '    activate',
    `    do script "${spec.escapedCommand}"`,
    '    set targetWindow to front window',
    `    set custom title of targetWindow to "${spec.escapedTitle}"`,
    `    set number of columns of targetWindow to ${spec.columns}`,
    `    set number of rows of targetWindow to ${spec.rows}`,
    `    set background color of ${settings} to ${list(spec.nativeBackground)}`,
    `    set normal text color of ${settings} to ${list(spec.nativeForeground)}`,
    `    set font size of ${settings} to ${spec.fontSize}`,
    'end tell',
    '',
  ].join('\n');
}

export function emulatorArgs(spec: Omit<EmulatorLaunchSpec, 'args'>): string[] {
  return [
    '-T', spec.title,
    '-geometry', `${spec.columns}x${spec.rows}`,
    '-sl', String(spec.scrollback),
    '-fa', `${EMULATOR_FONT_FAMILY}-${spec.fontSize}`,
    '-fg', toXtermColor(spec.foreground),
    '-bg', toXtermColor(spec.background),
    '-e', spec.command,
  ];
}

export function buildLaunchSpec(
  conn: ConnectionSpec,
  appearance: Appearance,
  strategy: HostStrategy,
  clients: ClientPaths,
): LaunchSpec {
  const command = buildRemoteCommand(conn, appearance.keyPath, clients);
  const { columns, rows } = parseGeometry(appearance.geometry);
  const base = {
    client: conn.protocol,
    username: conn.username,
    hostname: conn.hostname,
    port: conn.port,
    keyPath: conn.protocol === 'ssh' && appearance.keyPath ? appearance.keyPath : undefined,
    title: conn.title,
    columns,
    rows,
    fontSize: appearance.fontSize,
    foreground: appearance.foreground,
    background: appearance.background,
    command,
  };

  switch (strategy.kind) {
    case 'native': {
      const spec: NativeLaunchSpec = {
        ...base,
        kind: 'native',
        program: NATIVE_PROGRAM,
        args: [],
        escapedCommand: escapeScriptString(command),
        escapedTitle: escapeScriptString(conn.title),
        nativeForeground: toNativeColor(appearance.foreground),
        nativeBackground: toNativeColor(appearance.background),
      };
      spec.args = ['-e', renderAppleScript(spec)];
      return spec;
    }
    case 'emulator': {
      const partial = { ...base, kind: 'emulator' as const, program: strategy.program, scrollback: appearance.scrollback };
      return { ...partial, args: emulatorArgs(partial) };
    }
  }
}
