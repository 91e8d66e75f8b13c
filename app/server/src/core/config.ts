import os from 'os';
import path from 'path';
import { DEFAULT_PROBE_TIMEOUT_SECONDS } from './probe';
import type { TerminalPreference } from './launcher';

type Env = Record<string, string | undefined>;

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  prefsFile: string;
  terminal: TerminalPreference;
  probeTimeoutSeconds: number;
}

// Single-origin CORS with sensible localhost defaults.
export const DEFAULT_ORIGINS = [
  'http://localhost:5173', 'http://127.0.0.1:5173',
  'http://localhost:3000', 'http://127.0.0.1:3000',
];

function terminalPreference(raw: string | undefined): TerminalPreference {
  const v = String(raw || '').trim().toLowerCase();
  return v === 'native' || v === 'emulator' ? v : 'auto';
}

function positiveNumber(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const envOrigins = (env.CORS_ORIGIN || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  return {
    port: positiveNumber(env.PORT, 3001),
    corsOrigins: envOrigins.length ? envOrigins : DEFAULT_ORIGINS,
    prefsFile: env.HOSTLAUNCH_PREFS || path.join(os.homedir(), '.hostlaunch'),
    terminal: terminalPreference(env.HOSTLAUNCH_TERMINAL),
    probeTimeoutSeconds: positiveNumber(env.HOSTLAUNCH_PROBE_TIMEOUT, DEFAULT_PROBE_TIMEOUT_SECONDS),
  };
}
