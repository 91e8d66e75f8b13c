import { FormatError, ValidationError } from './errors';
import type { ConnectionSpec, Protocol } from '../types/domain';

export interface ConnectionInput {
  hostname: string;
  port: string;
  protocol: Protocol;
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORTS: Record<Protocol, string> = {
  ssh: '22',
  telnet: '23',
};

export function defaultPort(protocol: Protocol): string {
  return DEFAULT_PORTS[protocol];
}

// USER, then LOGNAME; first non-empty wins
export function localUsername(env: Env = process.env): string {
  for (const name of ['USER', 'LOGNAME']) {
    const v = env[name];
    if (v) return v;
  }
  return '';
}

/**
 * Splits the hostname field into user, host and window title.
 *
 * `alice@host1` keeps its text as the title. A bare `host1` borrows the local
 * username and is titled `<user>@host1`. Telnet windows are always titled
 * `telnet: <host>`.
 */
export function resolveConnection(input: ConnectionInput, env: Env = process.env): ConnectionSpec {
  const raw = input.hostname.trim();
  const port = input.port.trim();
  if (!raw) throw new ValidationError('Please enter a hostname.');

  let username: string;
  let hostname: string;
  let title: string;
  if (raw.includes('@')) {
    const parts = raw.split('@');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new FormatError('Invalid hostname format.');
    }
    [username, hostname] = parts;
    title = raw;
  } else {
    username = localUsername(env);
    hostname = raw;
    title = `${username}@${hostname}`;
  }

  if (input.protocol === 'telnet') title = `telnet: ${hostname}`;

  if (!port) throw new ValidationError('No port specified: Please enter a port number.');

  return { protocol: input.protocol, username, hostname, port, title };
}
