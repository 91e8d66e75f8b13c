import { Router } from 'express';
import { DEFAULT_SCOPE, validateScope } from '../core/registry';
import { logger, sanitize } from '../core/log';
import { asBody, parseAppearance, parseSession, toAppearanceDto, toSessionDto } from './dto';
import { blankSession } from './context';
import type { ApiContext } from './context';

export function sessionsRouter({ registry }: ApiContext) {
  const r = Router();

  r.get('/', (_req, res) => {
    res.json({ names: registry.listSessionNames() });
  });

  r.get('/:name', (req, res) => {
    const name = req.params.name;
    // Defaults are served by their own router
    if (name === DEFAULT_SCOPE || !registry.hasSession(name)) return res.status(404).json({ error: 'not found' });
    res.json(toSessionDto(registry.loadSession(name, blankSession(registry))));
  });

  // Full overwrite: fields missing from the body come from the defaults, not the old record
  r.put('/:name', (req, res) => {
    const name = req.params.name.trim();
    validateScope(name);
    const fields = parseSession(asBody(req.body), blankSession(registry));
    fields.name = name;
    registry.saveSession(name, fields);
    res.json(toSessionDto(fields));
  });

  r.delete('/:name', (req, res) => {
    const name = req.params.name;
    validateScope(name);
    registry.deleteSession(name);
    logger.info('api.sessions.delete', { name: sanitize(name) });
    res.json({ ok: true });
  });

  logger.info('api.sessions.ready');
  return r;
}

export function defaultsRouter({ registry }: ApiContext) {
  const r = Router();

  r.get('/', (_req, res) => {
    res.json(toAppearanceDto(blankSession(registry)));
  });

  r.put('/', (req, res) => {
    const next = parseAppearance(asBody(req.body), blankSession(registry));
    registry.saveDefaults(next);
    res.json(toAppearanceDto(next));
  });

  return r;
}
