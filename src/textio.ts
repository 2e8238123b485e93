// Text helpers: 8-bit names, UTF-16BE strings and hex dumps

import { MalformedHeaderError, MissingTerminatorError } from './errors.js';

export function decodeLatin1(data: Uint8Array): string {
  let result = '';
  for (let i = 0; i < data.length; i++) {
    result += String.fromCharCode(data[i]);
  }
  return result;
}

export function encodeLatin1(str: string): Uint8Array {
  const result = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    const code = str.charCodeAt(i);
    if (code > 0xFF) {
      throw new MalformedHeaderError(`'${str}' contains a character that doesn't fit in one byte`);
    }
    result[i] = code;
  }
  return result;
}

// Code units are copied as-is so unpaired surrogates survive a round trip.
export function decodeUtf16BE(data: Uint8Array): string {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const units: number[] = [];
  for (let pos = 0; pos + 1 < data.length; pos += 2) {
    units.push(view.getUint16(pos, false));
  }

  let result = '';
  for (let i = 0; i < units.length; i += 4096) {
    result += String.fromCharCode(...units.slice(i, i + 4096));
  }
  return result;
}

export function encodeUtf16BE(str: string): Uint8Array {
  const result = new Uint8Array(str.length * 2);
  const view = new DataView(result.buffer);
  for (let i = 0; i < str.length; i++) {
    view.setUint16(i * 2, str.charCodeAt(i), false);
  }
  return result;
}

/** Byte length of `str` once encoded as UTF-16BE, terminator excluded. */
export function utf16ByteLength(str: string): number {
  return str.length * 2;
}

/**
 * Returns the position of the first all-zero unit of `unitSize` bytes at or
 * after `start`, stepping one unit at a time from `start`.
 */
export function findTerminator(data: Uint8Array, start: number, unitSize: 1 | 2): number {
  for (let pos = start; pos + unitSize <= data.length; pos += unitSize) {
    if (data[pos] === 0 && (unitSize === 1 || data[pos + 1] === 0)) {
      return pos;
    }
  }
  throw new MissingTerminatorError(
    `no ${unitSize === 1 ? 'null' : 'double-null'} terminator after offset ${start} (${data.length} bytes available)`
  );
}

export function readCString(data: Uint8Array, start: number): string {
  const end = findTerminator(data, start, 1);
  return decodeLatin1(data.subarray(start, end));
}

export function readUtf16String(data: Uint8Array, start: number): string {
  const end = findTerminator(data, start, 2);
  return decodeUtf16BE(data.subarray(start, end));
}

export function toHex(data: Uint8Array): string {
  return Array.from(data)
    .map(byte => byte.toString(16).padStart(2, '0'))
    .join('')
    .toUpperCase();
}

export function fromHex(hexStr: string): Uint8Array {
  if (hexStr.length % 2 !== 0 || /[^0-9a-fA-F]/.test(hexStr)) {
    throw new Error('Expected an even-length hex string');
  }

  const result = new Uint8Array(hexStr.length / 2);
  for (let i = 0; i < hexStr.length; i += 2) {
    result[i / 2] = parseInt(hexStr.slice(i, i + 2), 16);
  }
  return result;
}
