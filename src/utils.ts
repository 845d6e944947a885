// Assorted helpers used across the wrappers: shell word splitting, secret
// masking, unit conversion and naming.

import { randomInt, randomUUID } from 'crypto';
import * as _ from 'lodash';
import { ValueError } from './exceptions';

export const BYTES_IN_KB = 1024;
export const BYTES_IN_MB = 1024 * BYTES_IN_KB;
export const BYTES_IN_GB = 1024 * BYTES_IN_MB;
export const BYTES_IN_TB = 1024 * BYTES_IN_GB;

// Split a command line into words following POSIX shell quoting rules.
// Single quotes preserve everything literally, double quotes allow \" \\ \$
// and \` escapes, and outside of quotes a backslash escapes any character.
export function shlexSplit (cmd: string): string[] {
  const words: string[] = [];
  let word = '';
  let inWord = false;
  let i = 0;

  while (i < cmd.length) {
    const ch = cmd[i];
    if (ch === "'") {
      const end = cmd.indexOf("'", i + 1);
      if (end < 0) {
        throw new ValueError('No closing quotation');
      }
      word += cmd.slice(i + 1, end);
      inWord = true;
      i = end + 1;
    } else if (ch === '"') {
      i++;
      let closed = false;
      while (i < cmd.length) {
        const c = cmd[i];
        if (c === '"') {
          closed = true;
          i++;
          break;
        }
        if (c === '\\' && i + 1 < cmd.length && '"\\$`'.includes(cmd[i + 1])) {
          word += cmd[i + 1];
          i += 2;
        } else {
          word += c;
          i++;
        }
      }
      if (!closed) {
        throw new ValueError('No closing quotation');
      }
      inWord = true;
    } else if (ch === '\\') {
      if (i + 1 >= cmd.length) {
        throw new ValueError('No escaped character');
      }
      word += cmd[i + 1];
      inWord = true;
      i += 2;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        words.push(word);
        word = '';
        inWord = false;
      }
      i++;
    } else {
      word += ch;
      inWord = true;
      i++;
    }
  }
  if (inWord) {
    words.push(word);
  }
  return words;
}

// Replace secrets in the text with asterisks.
export function maskSecrets (plaintext: string, secrets?: string[]): string;
export function maskSecrets (plaintext: string[], secrets?: string[]): string[];
export function maskSecrets (plaintext: string | string[], secrets?: string[]): string | string[] {
  if (!secrets) {
    return plaintext;
  }
  const mask = (text: string) =>
    secrets.reduce((acc, secret) => (secret ? acc.split(secret).join('*****') : acc), text);
  return Array.isArray(plaintext) ? plaintext.map(mask) : mask(plaintext);
}

export function listInsertAtPosition<T> (list: T[], index: number, items: T[]): T[] {
  return [...list.slice(0, index), ...items, ...list.slice(index)];
}

export function getRandomStr (size = 13): string {
  const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
  let result = '';
  for (let i = 0; i < size; i++) {
    result += chars[randomInt(chars.length)];
  }
  return result;
}

// Unique k8s friendly name, kept under 40 characters.
export function createUniqueResourceName (resourceDescription: string, resourceType: string): string {
  const desc = resourceDescription.slice(0, 23).toLowerCase().replace(/_/g, '-');
  const name = `${resourceType}-${desc}-${randomUUID().replace(/-/g, '')}`;
  return name.length < 40 ? name : name.slice(0, 40);
}

const DEVICE_SIZE_EXP: Record<string, number> = { Ti: 4, Gi: 3, Mi: 2, Ki: 1, Bi: 0 };
const TARGET_SIZE_EXP: Record<string, number> = { TB: 4, GB: 3, MB: 2, KB: 1, BY: 0 };

// Convert a k8s size string (i.e. '100Gi') to a number in the given units.
//
// @param unformattedSize  Size with one of the Ti, Gi, Mi, Ki, Bi suffixes.
// @param unitsTo          One of TB, GB, MB, KB, BY.
// @param convertSize      Base of the conversion, 1000 or 1024.
export function convertDeviceSize (
  unformattedSize: string,
  unitsTo: string,
  convertSize: 1000 | 1024 = 1000
): number {
  const units = unformattedSize.slice(-2);
  const abso = parseInt(unformattedSize.slice(0, -2), 10);
  const from = DEVICE_SIZE_EXP[units];
  const to = TARGET_SIZE_EXP[unitsTo];
  if (from === undefined || to === undefined || isNaN(abso)) {
    throw new ValueError(`Cannot convert ${unformattedSize} to ${unitsTo}`);
  }
  return abso * Math.pow(convertSize, from - to);
}

// Convert a byte count to the biggest unit possible, i.e. '1.50MB'.
export function convertBytesToUnit (bytesToConvert: string | number): string {
  const bytes = Number(bytesToConvert);
  if (isNaN(bytes)) {
    throw new ValueError(`Unable to convert ${bytesToConvert}, expected a number`);
  }
  if (bytes < BYTES_IN_KB) {
    return `${bytesToConvert}B`;
  }
  if (bytes < BYTES_IN_MB) {
    return `${(bytes / BYTES_IN_KB).toFixed(2)}KB`;
  }
  if (bytes < BYTES_IN_GB) {
    return `${(bytes / BYTES_IN_MB).toFixed(2)}MB`;
  }
  if (bytes < BYTES_IN_TB) {
    return `${(bytes / BYTES_IN_GB).toFixed(2)}GB`;
  }
  return `${(bytes / BYTES_IN_TB).toFixed(2)}TB`;
}

const HUMAN_UNITS: Record<string, number> = {
  E: Math.pow(2, 60),
  P: Math.pow(2, 50),
  T: Math.pow(2, 40),
  G: Math.pow(2, 30),
  M: Math.pow(2, 20),
  K: Math.pow(2, 10),
  B: 1
};

// Convert '1 GiB' or '512 Mi' style sizes to bytes.
export function humanToBytesUi (sizeStr: string): number {
  const parts = sizeStr.trim().split(/\s+/);
  if (parts.length !== 2) {
    throw new ValueError(`Invalid size: ${sizeStr}`);
  }
  const mult = HUMAN_UNITS[parts[1][0]];
  const size = parseFloat(parts[0]);
  if (mult === undefined || isNaN(size)) {
    throw new ValueError(`Invalid size: ${sizeStr}`);
  }
  return Math.floor(size * mult);
}

export function encode (message: string): string {
  return Buffer.from(message, 'ascii').toString('base64');
}

export function decode (encodedMessage: string): string {
  return Buffer.from(encodedMessage, 'base64').toString('ascii');
}

export function sleep (seconds: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
}

export function errorMessage (err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isRecord (val: unknown): val is Record<string, unknown> {
  return typeof val === 'object' && val !== null && !Array.isArray(val);
}

// Typed lookups into parsed YAML/JSON documents.
export type Path = string | Array<string | number>;

export function getIn (obj: unknown, path: Path): unknown {
  return _.get(obj, path);
}

export function getStr (obj: unknown, path: Path): string | undefined {
  const val = _.get(obj, path);
  return typeof val === 'string' ? val : undefined;
}

export function getNum (obj: unknown, path: Path): number | undefined {
  const val = _.get(obj, path);
  return typeof val === 'number' ? val : undefined;
}

export function getList (obj: unknown, path: Path): unknown[] {
  const val = _.get(obj, path);
  return Array.isArray(val) ? val : [];
}

export function getRecord (obj: unknown, path: Path): Record<string, unknown> {
  const val = _.get(obj, path);
  return isRecord(val) ? val : {};
}
