import { FormatError, ValidationError } from './errors';
import type { Rgb } from '../types/domain';

export const BLACK: Rgb = { r: 0, g: 0, b: 0 };
export const WHITE: Rgb = { r: 255, g: 255, b: 255 };

const TWO_32 = 2 ** 32;
const TWO_31 = 2 ** 31;

function assertChannel(name: string, v: number) {
  if (!Number.isInteger(v) || v < 0 || v > 255) {
    throw new ValidationError(`color channel ${name} must be an integer 0-255, got ${v}`);
  }
}

/**
 * Packs a color the way the legacy file format stores it: ARGB with alpha
 * fixed at 255, read back as a signed 32-bit integer. White is -1, black is
 * -16777216.
 */
export function toSigned32(r: number, g: number, b: number): number {
  assertChannel('r', r);
  assertChannel('g', g);
  assertChannel('b', b);
  const packed = ((0xff << 24) | (r << 16) | (g << 8) | b) >>> 0;
  return packed >= TWO_31 ? packed - TWO_32 : packed;
}

/**
 * Inverse of {@link toSigned32}. Channels come from the low 32 bits, so any
 * decimal integer decodes; only text that is not an integer throws.
 */
export function fromSigned32(text: string): Rgb {
  const trimmed = String(text).trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new FormatError(`not an integer color value: ${JSON.stringify(text)}`);
  }
  // asUintN folds negatives the same way as adding 2^32
  const packed = Number(BigInt.asUintN(32, BigInt(trimmed)));
  return {
    r: (packed >>> 16) & 0xff,
    g: (packed >>> 8) & 0xff,
    b: packed & 0xff,
  };
}

// Stored colors that fail to parse silently become black
export function decodeColor(text: string): Rgb {
  try {
    return fromSigned32(text);
  } catch (e) {
    if (e instanceof FormatError) return { ...BLACK };
    throw e;
  }
}

export function encodeColor(c: Rgb): string {
  return String(toSigned32(c.r, c.g, c.b));
}

export function parseHex(hex: string): Rgb {
  const m = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(String(hex).trim());
  if (!m) throw new FormatError(`not a #rrggbb color: ${JSON.stringify(hex)}`);
  return {
    r: parseInt(m[1], 16),
    g: parseInt(m[2], 16),
    b: parseInt(m[3], 16),
  };
}

function hex2(v: number) {
  return v.toString(16).padStart(2, '0');
}

export function toHex(c: Rgb): string {
  return `#${hex2(c.r)}${hex2(c.g)}${hex2(c.b)}`;
}

export function toXtermColor(c: Rgb): string {
  return `rgb:${hex2(c.r)}/${hex2(c.g)}/${hex2(c.b)}`;
}

// AppleScript colors use 16 bits per channel; 0xff * 257 === 0xffff
export function toNativeColor(c: Rgb): [number, number, number] {
  return [c.r * 257, c.g * 257, c.b * 257];
}
