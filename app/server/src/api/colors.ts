import { Router } from 'express';
import { encodeColor, fromSigned32, parseHex, toHex, BLACK } from '../core/color';
import { FormatError } from '../core/errors';

export function colorsRouter() {
  const r = Router();

  // Unparseable values decode to black, flagged so the UI can tell
  r.get('/decode', (req, res) => {
    const value = String(req.query.value ?? '');
    try {
      res.json({ hex: toHex(fromSigned32(value)), fallback: false });
    } catch (e) {
      if (!(e instanceof FormatError)) throw e;
      res.json({ hex: toHex(BLACK), fallback: true });
    }
  });

  r.get('/encode', (req, res) => {
    const hex = String(req.query.hex ?? '');
    res.json({ value: encodeColor(parseHex(hex)) });
  });

  return r;
}
