import { decodeColor, encodeColor, WHITE, BLACK } from './color';
import { ValidationError } from './errors';
import { logger, sanitize } from './log';
import { byCodePoint } from './properties';
import type { KeyValueStore } from './properties';
import { GEOMETRIES, PROTOCOLS } from '../types/domain';
import type { Appearance, Geometry, Protocol, SessionFields } from '../types/domain';

export const DEFAULT_SCOPE = 'default';

// Stored in place of a path when the client's own key should be used
export const DEFAULT_KEY = 'default';

export const DEFAULT_SCROLLBACK = 10000;
export const DEFAULT_FONT_SIZE = 10;

export const DEFAULT_APPEARANCE: Readonly<Appearance> = {
  background: WHITE,
  foreground: BLACK,
  geometry: '80x24',
  scrollback: DEFAULT_SCROLLBACK,
  fontSize: DEFAULT_FONT_SIZE,
  keyPath: '',
};

export const SESSION_FIELDS = [
  'background',
  'foreground',
  'hostname',
  'mode',
  'name',
  'port',
  'geometry',
  'keypath',
  'scrollback',
  'fontsize',
] as const;

export type SessionField = (typeof SESSION_FIELDS)[number];

export interface SessionRegistry {
  listSessionNames(): string[];
  hasSession(scope: string): boolean;
  /** Stored values win; anything not stored keeps the value from `current`. */
  loadSession(scope: string, current: SessionFields): SessionFields;
  loadDefaults(current: Appearance): Appearance;
  saveSession(scope: string, fields: SessionFields): void;
  saveDefaults(appearance: Appearance): void;
  deleteSession(scope: string): void;
  /** Writes `initial` as the defaults when none exist yet. */
  ensureDefaults(initial: Appearance): boolean;
}

function asGeometry(v: string): Geometry | undefined {
  return GEOMETRIES.find((g) => g === v);
}

function asProtocol(v: string): Protocol | undefined {
  return PROTOCOLS.find((p) => p === v);
}

function parseIntOr(text: string, fallback: number): number {
  const t = text.trim();
  return /^[+-]?\d+$/.test(t) ? parseInt(t, 10) : fallback;
}

export function validateScope(scope: string) {
  if (!scope) throw new ValidationError('session name is required');
  if (scope === DEFAULT_SCOPE) throw new ValidationError(`"${DEFAULT_SCOPE}" is reserved for the default settings`);
  if (/[.=\r\n]/.test(scope)) {
    throw new ValidationError(`session name may not contain ".", "=" or line breaks: ${scope}`);
  }
}

export function createRegistry(store: KeyValueStore, file: string): SessionRegistry {
  const key = (scope: string, field: SessionField) => `${scope}.${field}`;

  // Absent and empty values both count as "not stored"
  const read = (scope: string, field: SessionField) => store.get(key(scope, field)) || undefined;

  function persist() {
    store.store(file);
  }

  function mergeAppearance(scope: string, current: Appearance): Appearance {
    const next: Appearance = { ...current };

    const geometry = read(scope, 'geometry');
    if (geometry) next.geometry = asGeometry(geometry) ?? GEOMETRIES[0];

    const scrollback = read(scope, 'scrollback');
    if (scrollback) next.scrollback = parseIntOr(scrollback, DEFAULT_SCROLLBACK);

    const fontSize = read(scope, 'fontsize');
    if (fontSize) next.fontSize = parseIntOr(fontSize, DEFAULT_FONT_SIZE);

    const keyPath = read(scope, 'keypath');
    if (keyPath) next.keyPath = keyPath === DEFAULT_KEY ? '' : keyPath;

    const background = read(scope, 'background');
    if (background) next.background = decodeColor(background);

    const foreground = read(scope, 'foreground');
    if (foreground) next.foreground = decodeColor(foreground);

    return next;
  }

  function writeAppearance(scope: string, a: Appearance) {
    store.set(key(scope, 'background'), encodeColor(a.background));
    store.set(key(scope, 'foreground'), encodeColor(a.foreground));
    store.set(key(scope, 'geometry'), a.geometry);
    store.set(key(scope, 'scrollback'), String(a.scrollback));
    store.set(key(scope, 'fontsize'), String(a.fontSize));
    store.set(key(scope, 'keypath'), a.keyPath || DEFAULT_KEY);
  }

  function saveDefaults(appearance: Appearance) {
    writeAppearance(DEFAULT_SCOPE, appearance);
    persist();
    logger.info('registry.save_defaults');
  }

  return {
    listSessionNames() {
      const names: string[] = [];
      for (const k of store.keys()) {
        if (!k.endsWith('.name')) continue;
        const v = store.get(k);
        if (v) names.push(v);
      }
      return names.sort(byCodePoint);
    },
    hasSession(scope) {
      const prefix = `${scope}.`;
      return store.keys().some((k) => k.startsWith(prefix));
    },
    loadSession(scope, current) {
      const { name, hostname, port, mode } = current;
      const merged: SessionFields = { ...mergeAppearance(scope, current), name, hostname, port, mode };
      if (scope === DEFAULT_SCOPE) return merged;

      merged.name = read(scope, 'name') ?? merged.name;
      merged.hostname = read(scope, 'hostname') ?? merged.hostname;
      merged.port = read(scope, 'port') ?? merged.port;
      merged.mode = asProtocol(read(scope, 'mode') ?? '') ?? merged.mode;
      logger.debug('registry.load', { scope: sanitize(scope) });
      return merged;
    },
    loadDefaults(current) {
      return mergeAppearance(DEFAULT_SCOPE, current);
    },
    saveSession(scope, fields) {
      if (scope === DEFAULT_SCOPE) {
        saveDefaults(fields);
        return;
      }
      if (!fields.name.trim() || !fields.hostname.trim() || !fields.port.trim()) {
        throw new ValidationError('Please enter a hostname, a port number, and a session name.');
      }
      validateScope(scope);
      store.set(key(scope, 'name'), fields.name);
      store.set(key(scope, 'hostname'), fields.hostname);
      store.set(key(scope, 'mode'), fields.mode);
      store.set(key(scope, 'port'), fields.port);
      writeAppearance(scope, fields);
      persist();
      logger.info('registry.save', { scope: sanitize(scope), mode: fields.mode });
    },
    saveDefaults,
    deleteSession(scope) {
      for (const field of SESSION_FIELDS) store.remove(key(scope, field));
      persist();
      logger.info('registry.delete', { scope: sanitize(scope) });
    },
    ensureDefaults(initial) {
      const present = store.keys().some((k) => k.startsWith(`${DEFAULT_SCOPE}.`));
      if (present) return false;
      saveDefaults(initial);
      logger.info('registry.defaults_created');
      return true;
    },
  };
}
