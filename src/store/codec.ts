import type { MatchRecord } from '../engine/types.js';
import { InvalidPlayerNameError } from './errors.js';

const DELIMITER = ',';
const QUOTE = '"';
const NEEDS_QUOTES = /[",]|^\s|\s$/;
const LINE_BREAK = /[\r\n]/;

export interface DecodeSuccess {
  ok: true;
  record: MatchRecord;
}

export interface DecodeFailure {
  ok: false;
  message: string;
}

export type DecodeResult = DecodeSuccess | DecodeFailure;

const encodeField = (value: string) => {
  if (LINE_BREAK.test(value)) {
    throw new InvalidPlayerNameError(`cannot store name ${JSON.stringify(value)}: contains a line break`);
  }
  return NEEDS_QUOTES.test(value) ? `${QUOTE}${value.replaceAll(QUOTE, QUOTE + QUOTE)}${QUOTE}` : value;
};

export const encodeRecord = (record: MatchRecord) =>
  [encodeField(record.player1), encodeField(record.player2), String(record.result)].join(DELIMITER);

type SplitResult = { ok: true; fields: string[] } | { ok: false; message: string };

export const splitLine = (line: string): SplitResult => {
  const fields: string[] = [];
  let index = 0;

  for (;;) {
    if (line[index] === QUOTE) {
      let value = '';
      index += 1;
      for (;;) {
        if (index >= line.length) return { ok: false, message: 'unterminated quoted field' };
        const char = line[index];
        if (char === QUOTE) {
          if (line[index + 1] === QUOTE) {
            value += QUOTE;
            index += 2;
            continue;
          }
          index += 1;
          break;
        }
        value += char;
        index += 1;
      }
      if (index < line.length && line[index] !== DELIMITER) {
        return { ok: false, message: `unexpected character after quoted field at column ${index + 1}` };
      }
      fields.push(value);
    } else {
      const next = line.indexOf(DELIMITER, index);
      const end = next === -1 ? line.length : next;
      fields.push(line.slice(index, end));
      index = end;
    }

    if (index >= line.length) return { ok: true, fields };
    index += 1;
  }
};

export const decodeRecord = (line: string): DecodeResult => {
  const split = splitLine(line);
  if (!split.ok) return split;

  const { fields } = split;
  if (fields.length !== 3) {
    return { ok: false, message: `expected 3 fields, found ${fields.length}` };
  }

  const [player1, player2, rawResult] = fields;
  if (rawResult !== '0' && rawResult !== '1') {
    return { ok: false, message: `result must be 0 or 1, found ${JSON.stringify(rawResult)}` };
  }

  return { ok: true, record: { player1, player2, result: rawResult === '1' ? 1 : 0 } };
};

export const encodeHistory = (history: readonly MatchRecord[]) =>
  history.map((record) => `${encodeRecord(record)}\n`).join('');
