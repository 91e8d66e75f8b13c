import http from 'http';
import os from 'os';
import { createApp } from './app';
import { loadConfig } from './core/config';
import { NotFoundError } from './core/errors';
import { createLauncher, detectHostStrategy, discoverClients, locateExecutable } from './core/launcher';
import { logger, sanitize } from './core/log';
import { checkTcpReachable } from './core/probe';
import { createProperties } from './core/properties';
import { createRegistry, DEFAULT_APPEARANCE } from './core/registry';
import type { HostStrategy } from './types/domain';

const config = loadConfig();

// The properties file is the single store for this process
const store = createProperties();
store.load(config.prefsFile);
const registry = createRegistry(store, config.prefsFile);
registry.ensureDefaults({ ...DEFAULT_APPEARANCE });

const locate = (name: string) => locateExecutable(name);
const clients = discoverClients(locate);

let strategy: HostStrategy | null = null;
try {
  strategy = detectHostStrategy(os.platform(), locate, config.terminal);
} catch (e) {
  if (!(e instanceof NotFoundError)) throw e;
  logger.error('discover.terminal_missing', { err: e.message });
}

const app = createApp(
  {
    registry,
    launcher: createLauncher(),
    clients,
    strategy,
    probe: (host, port) => checkTcpReachable(host, port, config.probeTimeoutSeconds),
    env: process.env,
  },
  config.corsOrigins,
);
const server = http.createServer(app);

server.listen(config.port, () => {
  logger.info('server.listening', {
    port: config.port,
    prefs: sanitize(config.prefsFile),
    terminal: strategy?.kind ?? 'none',
  });
});

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
let shuttingDown = false;
function shutdown() {
  if (shuttingDown) return; shuttingDown = true;
  logger.info('server.shutdown');
  server.close(() => process.exit(0));
  // Give in-flight probes a moment before forcing exit
  setTimeout(() => process.exit(0), 1000).unref();
}
