// Main API for the retro-pak library

import type { CodecOptions, PakJson } from './types.js';
import { Pak } from './pak.js';
import { getCodecs } from './codecs.js';
import { pakToJsonObject } from './jsonio.js';

export function load(data: Uint8Array, options: CodecOptions = {}): Pak {
  return Pak.fromBytes(data, getCodecs(options));
}

export function save(pak: Pak): Uint8Array {
  return pak.toBytes();
}

export function describePak(data: Uint8Array, options: CodecOptions = {}): PakJson {
  const registry = getCodecs(options);
  return pakToJsonObject(Pak.fromBytes(data, registry), { registry });
}

// Re-export types and utilities
export * from './types.js';
export * from './errors.js';
export * from './align.js';
export * from './textio.js';
export * from './structtemplate.js';
export * from './records.js';
export * from './strg.js';
export * from './codecs.js';
export * from './pak.js';
export * from './jsonio.js';
