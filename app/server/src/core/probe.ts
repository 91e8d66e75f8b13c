import net from 'net';
import dns from 'dns';
import { TimeoutError, UnreachableError, ValidationError } from './errors';
import { logger, sanitize } from './log';
import type { ProbeResult } from '../types/domain';

export const DEFAULT_PROBE_TIMEOUT_SECONDS = 5;

export type Lookup = (host: string) => Promise<unknown>;

export interface ProbeOptions {
  lookup?: Lookup;
}

const defaultLookup: Lookup = (host) => dns.promises.lookup(host);

export function parsePort(port: string): number {
  const t = port.trim();
  const n = /^\d+$/.test(t) ? Number(t) : NaN;
  if (!Number.isInteger(n) || n < 1 || n > 65535) {
    throw new ValidationError(`No port specified: invalid port ${JSON.stringify(port)}`);
  }
  return n;
}

function timedOut(host: string, port: number): ProbeResult {
  return { ok: false, reason: 'timeout', message: `Connection to ${host}:${port} timed out` };
}

// Settles with `undefined` once `ms` elapses without `work` settling
function withinDeadline<T>(work: Promise<T>, ms: number): Promise<T | undefined> {
  return new Promise<T | undefined>((resolve, reject) => {
    const timer = setTimeout(() => resolve(undefined), ms);
    work.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (e: unknown) => {
        clearTimeout(timer);
        reject(e);
      },
    );
  });
}

function connect(host: string, port: number, timeoutMs: number): Promise<ProbeResult> {
  return new Promise<ProbeResult>((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const finalize = (result: ProbeResult) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finalize({ ok: true }));
    socket.once('timeout', () => finalize(timedOut(host, port)));
    socket.once('error', (e) => {
      finalize({ ok: false, reason: 'unreachable', message: `${host}:${port}: ${e.message}` });
    });
    socket.connect(port, host);
  });
}

/**
 * Resolves the host, then opens and closes a TCP connection. Both steps
 * share one `timeoutSeconds` budget.
 */
export async function checkTcpReachable(
  host: string,
  port: number,
  timeoutSeconds = DEFAULT_PROBE_TIMEOUT_SECONDS,
  opts: ProbeOptions = {},
): Promise<ProbeResult> {
  const lookup = opts.lookup ?? defaultLookup;
  const budgetMs = timeoutSeconds * 1000;
  const started = Date.now();

  const resolved = await withinDeadline(
    lookup(host).then(
      () => true,
      (e: unknown) => {
        logger.warn('probe.unknown_host', { host: sanitize(host), err: String(e) });
        return false;
      },
    ),
    budgetMs,
  );
  if (resolved === undefined) {
    logger.warn('probe.fail', { host: sanitize(host), port, reason: 'timeout', phase: 'lookup' });
    return timedOut(host, port);
  }
  if (!resolved) return { ok: false, reason: 'unknown-host', message: `Unknown Host: ${host}` };

  const remainingMs = Math.max(budgetMs - (Date.now() - started), 1);
  const result = await connect(host, port, remainingMs);
  if (result.ok) logger.debug('probe.ok', { host: sanitize(host), port });
  else logger.warn('probe.fail', { host: sanitize(host), port, reason: result.reason });
  return result;
}

export function assertReachable(result: ProbeResult): void {
  if (result.ok) return;
  if (result.reason === 'timeout') throw new TimeoutError(result.message);
  throw new UnreachableError(result.message);
}
