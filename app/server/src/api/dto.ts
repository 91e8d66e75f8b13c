import { parseHex, toHex } from '../core/color';
import { defaultPort } from '../core/connection';
import { ValidationError } from '../core/errors';
import { GEOMETRIES, PROTOCOLS } from '../types/domain';
import type { Appearance, Geometry, Protocol, SessionFields } from '../types/domain';

// Wire shape: colors travel as #rrggbb
export interface AppearanceDto {
  background: string;
  foreground: string;
  geometry: Geometry;
  scrollback: number;
  fontSize: number;
  keyPath: string;
}

export interface SessionDto extends AppearanceDto {
  name: string;
  hostname: string;
  port: string;
  mode: Protocol;
}

export type Body = Record<string, unknown>;

export function asBody(input: unknown): Body {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return {};
  return Object.fromEntries(Object.entries(input));
}

export function toAppearanceDto(a: Appearance): AppearanceDto {
  return {
    background: toHex(a.background),
    foreground: toHex(a.foreground),
    geometry: a.geometry,
    scrollback: a.scrollback,
    fontSize: a.fontSize,
    keyPath: a.keyPath,
  };
}

export function toSessionDto(s: SessionFields): SessionDto {
  return {
    ...toAppearanceDto(s),
    name: s.name,
    hostname: s.hostname,
    port: s.port,
    mode: s.mode,
  };
}

function optionalString(body: Body, key: string): string | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  if (typeof v === 'number') return String(v);
  if (typeof v !== 'string') throw new ValidationError(`${key} must be a string`);
  // The preferences file is line based and values are written unescaped
  if (/[\r\n]/.test(v)) throw new ValidationError(`${key} must not contain line breaks`);
  return v.trim();
}

function optionalInteger(body: Body, key: string, min: number, max: number): number | undefined {
  const v = body[key];
  if (v === undefined || v === null) return undefined;
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isSafeInteger(n) || n < min || n > max) {
    throw new ValidationError(`${key} must be an integer between ${min} and ${max}`);
  }
  return n;
}

/** Applies the fields present in `body` over `base`. */
export const SCROLLBACK_RANGE = { min: 0, max: 20000 } as const;
export const FONT_SIZE_RANGE = { min: 6, max: 20 } as const;

export function parseAppearance(body: Body, base: Appearance): Appearance {
  const next: Appearance = { ...base };

  const background = optionalString(body, 'background');
  if (background !== undefined) next.background = parseHex(background);
  const foreground = optionalString(body, 'foreground');
  if (foreground !== undefined) next.foreground = parseHex(foreground);

  const geometry = optionalString(body, 'geometry');
  if (geometry !== undefined) {
    const match = GEOMETRIES.find((g) => g === geometry);
    if (!match) throw new ValidationError(`geometry must be one of ${GEOMETRIES.join(', ')}`);
    next.geometry = match;
  }

  next.scrollback =
    optionalInteger(body, 'scrollback', SCROLLBACK_RANGE.min, SCROLLBACK_RANGE.max) ?? next.scrollback;
  next.fontSize = optionalInteger(body, 'fontSize', FONT_SIZE_RANGE.min, FONT_SIZE_RANGE.max) ?? next.fontSize;
  next.keyPath = optionalString(body, 'keyPath') ?? next.keyPath;
  return next;
}

export function parseSession(body: Body, base: SessionFields): SessionFields {
  const next: SessionFields = { ...base, ...parseAppearance(body, base) };
  next.name = optionalString(body, 'name') ?? next.name;
  next.hostname = optionalString(body, 'hostname') ?? next.hostname;
  next.port = optionalString(body, 'port') ?? next.port;

  const mode = optionalString(body, 'mode');
  if (mode !== undefined) {
    const match = PROTOCOLS.find((p) => p === mode);
    if (!match) throw new ValidationError(`mode must be one of ${PROTOCOLS.join(', ')}`);
    next.mode = match;
    // Switching protocol without a port picks that protocol's usual one
    if (match !== base.mode && optionalString(body, 'port') === undefined) next.port = defaultPort(match);
  }
  return next;
}
