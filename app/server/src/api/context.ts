import { defaultPort } from '../core/connection';
import { DEFAULT_APPEARANCE } from '../core/registry';
import type { SessionRegistry } from '../core/registry';
import type { PlatformLauncher } from '../core/launcher';
import type { ClientPaths, HostStrategy, ProbeResult, SessionFields } from '../types/domain';

export interface ApiContext {
  registry: SessionRegistry;
  launcher: PlatformLauncher;
  clients: ClientPaths;
  strategy: HostStrategy | null; // null when no terminal was found
  probe(host: string, port: number): Promise<ProbeResult>;
  env: Record<string, string | undefined>;
}

// What an empty form shows: stored defaults, no host, ssh on its usual port
export function blankSession(registry: SessionRegistry): SessionFields {
  return {
    ...registry.loadDefaults({ ...DEFAULT_APPEARANCE }),
    name: '',
    hostname: '',
    port: defaultPort('ssh'),
    mode: 'ssh',
  };
}
