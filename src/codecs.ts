// Asset codecs and the type-tag registry used to pick one for each resource

import type { Asset, AssetCodec, AssetDecodeContext, CodecOptions, CodecRegistry, ResolvedCodec } from './types.js';
import { strgCodec } from './strg.js';

/** Identifier of the scan-tree asset, which is dispatched by ID rather than by its type tag. */
export const SCAN_TREE_ASSET_ID = 0x95B61279;

/**
 * Payload kept as the bytes it was read from. The bytes are copied in and out
 * so no caller shares a buffer with an archive.
 */
export class RawAsset implements Asset {
  readonly assetType: string;
  readonly data: Uint8Array;

  constructor(assetType: string, data: Uint8Array) {
    this.assetType = assetType;
    this.data = Uint8Array.from(data);
  }

  get encodedSize(): number {
    return this.data.length;
  }

  encode(): Uint8Array {
    return Uint8Array.from(this.data);
  }
}

export const rawCodec: AssetCodec<RawAsset> = {
  decode(data: Uint8Array, context: AssetDecodeContext): RawAsset {
    return new RawAsset(context.entry.assetType, data);
  }
};

export const standardCodecs: ReadonlyMap<string, AssetCodec> = new Map<string, AssetCodec>([
  ['STRG', strgCodec],
]);

export function getCodecs(options: CodecOptions = {}): CodecRegistry {
  const codecs = new Map<string, AssetCodec>(options.useStandardCodecs === false ? [] : standardCodecs);

  for (const [assetType, codec] of options.codecs ?? []) {
    codecs.set(assetType, codec);
  }

  return {
    codecs,
    scanTreeAssetId: options.scanTreeAssetId ?? SCAN_TREE_ASSET_ID,
    // Scan trees have no decoder of their own here; callers plug one in
    scanTreeCodec: options.scanTreeCodec ?? rawCodec,
    fallback: rawCodec
  };
}

export const defaultCodecs: CodecRegistry = getCodecs();

/**
 * Picks the codec for one resource:
 *  1. the scan-tree asset ID wins over whatever tag it is stored under,
 *  2. then the type tag,
 *  3. then the raw pass-through codec.
 */
export function resolveCodec(registry: CodecRegistry, assetType: string, assetId: number): ResolvedCodec {
  if (assetId === registry.scanTreeAssetId) {
    return { kind: 'scanTree', codec: registry.scanTreeCodec };
  }

  const tagged = registry.codecs.get(assetType);
  if (tagged) {
    return { kind: 'tagged', codec: tagged };
  }

  return { kind: 'fallback', codec: registry.fallback };
}
