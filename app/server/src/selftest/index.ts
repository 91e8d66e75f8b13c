import fs from 'fs';
import os from 'os';
import path from 'path';
import { isDeepStrictEqual } from 'util';
import { Router } from 'express';
import { createProperties } from '../core/properties';
import { createRegistry, DEFAULT_APPEARANCE } from '../core/registry';
import { resolveConnection } from '../core/connection';
import { buildLaunchSpec } from '../core/launch';
import { logger } from '../core/log';
import type { SessionFields } from '../types/domain';

/**
 * Saves a session to a scratch file, reads it back through a fresh store and
 * builds an emulator launch spec from it. Nothing is spawned.
 */
export function runSelftest() {
  const t0 = Date.now();
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'hostlaunch-'));
  const file = path.join(tmp, 'prefs');
  try {
    const saved: SessionFields = {
      ...DEFAULT_APPEARANCE,
      name: 'selftest',
      hostname: 'selftest@127.0.0.1',
      port: '22',
      mode: 'ssh',
    };
    createRegistry(createProperties(), file).saveSession('selftest', saved);

    const store = createProperties();
    store.load(file);
    const loaded = createRegistry(store, file).loadSession('selftest', {
      ...DEFAULT_APPEARANCE,
      name: '',
      hostname: '',
      port: '',
      mode: 'telnet',
    });
    const roundTrip = isDeepStrictEqual(loaded, saved);

    const conn = resolveConnection({ hostname: loaded.hostname, port: loaded.port, protocol: loaded.mode }, {});
    const spec = buildLaunchSpec(conn, loaded, { kind: 'emulator', program: 'xterm' }, { ssh: 'ssh' });
    const launch = spec.command === 'ssh -p 22 selftest@127.0.0.1';

    return { ok: roundTrip && launch, ms: Date.now() - t0, roundTrip, launch };
  } finally {
    fs.rmSync(tmp, { recursive: true, force: true });
  }
}

export function selftestRouter() {
  const r = Router();

  r.get('/readyz', (req, res) => {
    const doSelf = String(req.query.selftest || '0') === '1';
    if (!doSelf) return res.json({ ok: true });
    const result = runSelftest();
    logger.info('selftest', result);
    res.json(result);
  });

  return r;
}
