import { Router } from 'express';
import { resolveConnection } from '../core/connection';
import { NotFoundError, ValidationError } from '../core/errors';
import { buildLaunchSpec } from '../core/launch';
import { EMULATOR_BINARY } from '../core/launcher';
import { logger, sanitize } from '../core/log';
import { assertReachable, parsePort } from '../core/probe';
import { DEFAULT_SCOPE } from '../core/registry';
import { asBody, parseSession } from './dto';
import { blankSession } from './context';
import type { ApiContext } from './context';
import type { LaunchSpec } from '../types/domain';

/**
 * Turns a launch request into a LaunchSpec. The body may name a stored
 * `session`; its fields are loaded first and anything else in the body
 * overrides them.
 */
export function prepareLaunch(ctx: ApiContext, input: unknown): LaunchSpec {
  const body = asBody(input);
  let base = blankSession(ctx.registry);
  const session = typeof body.session === 'string' ? body.session.trim() : '';
  if (session) {
    if (session === DEFAULT_SCOPE || !ctx.registry.hasSession(session)) {
      throw new ValidationError(`Unknown session: ${session}`);
    }
    base = ctx.registry.loadSession(session, base);
  }
  const fields = parseSession(body, base);
  const conn = resolveConnection({ hostname: fields.hostname, port: fields.port, protocol: fields.mode }, ctx.env);
  if (!ctx.strategy) throw new NotFoundError(EMULATOR_BINARY);
  return buildLaunchSpec(conn, fields, ctx.strategy, ctx.clients);
}

export function launchRouter(ctx: ApiContext) {
  const r = Router();

  r.post('/preview', (req, res) => {
    res.json(prepareLaunch(ctx, req.body));
  });

  r.post('/', (req, res, next) => {
    const run = async () => {
      const spec = prepareLaunch(ctx, req.body);
      assertReachable(await ctx.probe(spec.hostname, parsePort(spec.port)));
      ctx.launcher.launch(spec);
      logger.info('api.launch', { host: sanitize(spec.hostname), client: spec.client, kind: spec.kind });
      return spec;
    };
    run().then((spec) => res.status(202).json(spec)).catch(next);
  });

  return r;
}
