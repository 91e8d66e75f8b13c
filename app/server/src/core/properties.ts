import fs from 'fs';
import path from 'path';
import { StorageError } from './errors';
import { logger, sanitize } from './log';

/**
 * Flat `key=value` properties with keys always iterated in code-point order.
 * The sort order is part of the on-disk format: files are written sorted so
 * diffs stay stable.
 *
 * Neither keys nor values are escaped. A value containing a line break, or a
 * key containing `=`, will not survive a store/load round trip.
 */
export interface KeyValueStore {
  get(key: string): string | undefined;
  has(key: string): boolean;
  set(key: string, value: string): void;
  remove(key: string): void;
  keys(): string[];
  load(file: string): void;
  store(file: string): void;
}

// String `<` compares UTF-16 units, which misorders astral characters.
export function byCodePoint(a: string, b: string): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; ) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) return ca - cb;
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export function createProperties(initial: Record<string, string> = {}): KeyValueStore {
  const props = new Map<string, string>(Object.entries(initial));

  function sortedKeys() {
    return [...props.keys()].sort(byCodePoint);
  }

  return {
    get(key) {
      return props.get(key);
    },
    has(key) {
      return props.has(key);
    },
    set(key, value) {
      props.set(key, value);
    },
    remove(key) {
      props.delete(key);
    },
    keys() {
      return sortedKeys();
    },
    load(file) {
      let text: string;
      try {
        text = fs.readFileSync(file, 'utf8');
      } catch (e) {
        if (isMissingFile(e)) {
          logger.debug('properties.load.missing', { file: sanitize(file) });
          return;
        }
        throw e;
      }
      for (const raw of text.split(/\r?\n/)) {
        const line = raw.trim();
        if (!line || line.startsWith('#')) continue;
        const eq = line.indexOf('=');
        if (eq === -1) continue;
        props.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
      }
      logger.debug('properties.load', { file: sanitize(file), count: props.size });
    },
    store(file) {
      const lines = ['#', `#${new Date().toString()}`];
      for (const key of sortedKeys()) lines.push(`${key}=${props.get(key) ?? ''}`);
      try {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, lines.join('\n') + '\n');
      } catch (e) {
        logger.error('properties.store.failed', { file: sanitize(file), err: String(e) });
        throw new StorageError(`Unable to write ${file}`, e);
      }
    },
  };
}
