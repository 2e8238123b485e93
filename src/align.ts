// Padding to the 32-byte boundaries used by PAK and STRG

export const ALIGNMENT = 32;
export const PADDING_BYTE = 0xFF;

export function paddingFor(length: number, boundary: number = ALIGNMENT): number {
  return (boundary - (length % boundary)) % boundary;
}

export function alignedLength(length: number, boundary: number = ALIGNMENT): number {
  return length + paddingFor(length, boundary);
}

export function padding(length: number): Uint8Array {
  return new Uint8Array(paddingFor(length)).fill(PADDING_BYTE);
}

/** Copies `data` into a new buffer right-padded with 0xFF to the next 32-byte boundary. */
export function padTo32(data: Uint8Array): Uint8Array {
  const result = new Uint8Array(alignedLength(data.length)).fill(PADDING_BYTE);
  result.set(data, 0);
  return result;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }

  const result = new Uint8Array(total);
  let pos = 0;
  for (const part of parts) {
    result.set(part, pos);
    pos += part.length;
  }
  return result;
}
