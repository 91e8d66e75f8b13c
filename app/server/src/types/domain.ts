export type Protocol = 'ssh' | 'telnet';

export const PROTOCOLS: readonly Protocol[] = ['ssh', 'telnet'];

export type Geometry = '80x24' | '80x43' | '132x24' | '132x43';

export const GEOMETRIES: readonly Geometry[] = ['80x24', '80x43', '132x24', '132x43'];

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

// Terminal settings shared by the `default` record and named sessions
export interface Appearance {
  background: Rgb;
  foreground: Rgb;
  geometry: Geometry;
  scrollback: number;
  fontSize: number;
  keyPath: string; // '' selects the client's default key
}

export interface SessionFields extends Appearance {
  name: string;
  hostname: string;
  port: string; // kept as typed; numeric check happens at probe time
  mode: Protocol;
}

export interface ConnectionSpec {
  protocol: Protocol;
  username: string;
  hostname: string;
  port: string;
  title: string;
}

export interface ClientPaths {
  ssh?: string;
  telnet?: string;
}

export type HostStrategy =
  | { kind: 'native' }
  | { kind: 'emulator'; program: string };

interface LaunchBase {
  client: Protocol;
  username: string;
  hostname: string;
  port: string;
  keyPath?: string;
  title: string;
  columns: number;
  rows: number;
  fontSize: number;
  foreground: Rgb;
  background: Rgb;
  command: string; // remote-access invocation
  program: string;
  args: string[];
}

export interface NativeLaunchSpec extends LaunchBase {
  kind: 'native';
  escapedCommand: string;
  escapedTitle: string;
  nativeForeground: [number, number, number];
  nativeBackground: [number, number, number];
}

export interface EmulatorLaunchSpec extends LaunchBase {
  kind: 'emulator';
  scrollback: number;
}

export type LaunchSpec = NativeLaunchSpec | EmulatorLaunchSpec;

export type ProbeFailure = 'unknown-host' | 'unreachable' | 'timeout';

export type ProbeResult = { ok: true } | { ok: false; reason: ProbeFailure; message: string };
