// Type definitions for the PAK / STRG codec

export interface NamedResourceEntry {
  readonly assetType: string;
  readonly assetId: number;
  readonly nameLength: number;
  readonly name: string;
}

export interface ResourceEntry {
  readonly compressed: boolean;
  readonly assetType: string;
  readonly assetId: number;
  /** Unpadded encoded size of the payload. */
  readonly size: number;
  /** Absolute offset of the payload from the start of the PAK. */
  readonly offset: number;
}

export interface LanguageEntry {
  readonly languageId: string;
  /** Relative to the first byte after the name table. */
  readonly stringsOffset: number;
  readonly stringsSize: number;
}

export interface NameEntry {
  /** Relative to the first byte after the name table's count/size header. */
  readonly offset: number;
  readonly stringIndex: number;
}

/**
 * Codec for one record type. `decode` returns the record and the number of
 * bytes it consumed starting at `offset`.
 */
export interface RecordCodec<T> {
  decode(data: Uint8Array, offset: number): [T, number];
  encode(record: T): Uint8Array;
  encodedSize(record: T): number;
}

/** A decoded resource payload. Every payload knows how to write itself back. */
export interface Asset {
  readonly assetType: string;
  readonly encodedSize: number;
  encode(): Uint8Array;
}

export interface AssetDecodeContext {
  readonly entry: ResourceEntry;
}

export interface AssetCodec<T extends Asset = Asset> {
  decode(data: Uint8Array, context: AssetDecodeContext): T;
}

export type CodecKind = 'scanTree' | 'tagged' | 'fallback';

export interface ResolvedCodec {
  kind: CodecKind;
  codec: AssetCodec;
}

export interface CodecRegistry {
  readonly codecs: ReadonlyMap<string, AssetCodec>;
  readonly scanTreeAssetId: number;
  readonly scanTreeCodec: AssetCodec;
  readonly fallback: AssetCodec;
}

export interface CodecOptions {
  /** Extra or overriding codecs keyed by type tag. */
  codecs?: Iterable<[string, AssetCodec]>;
  scanTreeCodec?: AssetCodec;
  scanTreeAssetId?: number;
  useStandardCodecs?: boolean;
}

export interface ConvertedResource {
  assetType: string;
  assetId: string;
  size: number;
  offset: number;
  compressed?: boolean;
  name?: string;
  codec: CodecKind;
  obj?: StrgJson;
  data?: string; // hex encoded
}

export interface StrgJson {
  magic: number;
  version: number;
  names: Record<string, number>;
  languages: Record<string, string[]>;
}

export interface PakJson {
  _metadata: {
    majorVersion: number;
    minorVersion: number;
    unused: number;
  };
  resources: ConvertedResource[];
}
