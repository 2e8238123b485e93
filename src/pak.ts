// PAK archive: directory of typed resources followed by 32-byte aligned payloads

import type { Asset, CodecRegistry, NamedResourceEntry, ResourceEntry } from './types.js';
import { StructTemplateParser, numberField } from './structtemplate.js';
import {
  RESOURCE_ENTRY_SIZE,
  checkNamedResourceEntry,
  decodeRecords,
  encodeRecords,
  encodedRecordsSize,
  namedResourceEntryCodec,
  resourceEntryCodec
} from './records.js';
import { alignedLength, concatBytes, padTo32, padding } from './align.js';
import { defaultCodecs, rawCodec, resolveCodec } from './codecs.js';
import {
  DuplicateIdentifierError,
  IndexOutOfRangeError,
  InvalidIdentifierError,
  MalformedHeaderError,
  TruncatedPayloadError,
  UnknownIdentifierError
} from './errors.js';

const PAK_HEADER_TEMPLATE = StructTemplateParser.fromTemplateString('>HHII:majorVersion,minorVersion,unused,namedResourceCount');
const COUNT_TEMPLATE = StructTemplateParser.fromTemplateString('>I:count');

export const PAK_HEADER_SIZE = PAK_HEADER_TEMPLATE.recordLength;
const COUNT_SIZE = COUNT_TEMPLATE.recordLength;

export interface PakInit {
  majorVersion?: number;
  minorVersion?: number;
  unused?: number;
  namedResources?: readonly NamedResourceEntry[];
  resources?: Iterable<[number, Asset]>;
}

const MAX_ASSET_ID = 0xFFFFFFFF;

function checkAssetId(assetId: number): void {
  if (!Number.isInteger(assetId) || assetId < 0 || assetId > MAX_ASSET_ID) {
    throw new InvalidIdentifierError(assetId);
  }
}

function formatAssetId(assetId: number): string {
  return `0x${assetId.toString(16).toUpperCase().padStart(8, '0')}`;
}

/** Size of everything before the payloads, before alignment. */
function directorySize(namedResources: readonly NamedResourceEntry[], resourceCount: number): number {
  return PAK_HEADER_SIZE +
    encodedRecordsSize(namedResourceEntryCodec, namedResources) +
    COUNT_SIZE +
    resourceCount * RESOURCE_ENTRY_SIZE;
}

/**
 * Entries describing `resources` laid out back to back from `resourcesStart`,
 * each one padded to 32 bytes. Sizes come from the payloads themselves.
 */
function layoutEntries(
  entries: readonly ResourceEntry[],
  resources: readonly Asset[],
  resourcesStart: number
): ResourceEntry[] {
  let offset = resourcesStart;
  return entries.map((entry, i) => {
    const size = resources[i].encodedSize;
    const laidOut = { ...entry, size, offset };
    offset += alignedLength(size);
    return laidOut;
  });
}

export class Pak {
  readonly majorVersion: number;
  readonly minorVersion: number;
  readonly unused: number;
  readonly namedResources: readonly NamedResourceEntry[];
  readonly resourceEntries: readonly ResourceEntry[];
  readonly resources: readonly Asset[];

  private readonly assetIdIndex: ReadonlyMap<number, number>;

  constructor(
    majorVersion: number,
    minorVersion: number,
    unused: number,
    namedResources: readonly NamedResourceEntry[],
    resourceEntries: readonly ResourceEntry[],
    resources: readonly Asset[]
  ) {
    if (resourceEntries.length !== resources.length) {
      throw new MalformedHeaderError(
        `PAK has ${resourceEntries.length} resource entries but ${resources.length} resources`
      );
    }

    // The directory size and every offset derive from these
    namedResources.forEach(entry => {
      checkAssetId(entry.assetId);
      checkNamedResourceEntry(entry);
    });
    resourceEntries.forEach(entry => checkAssetId(entry.assetId));

    this.majorVersion = majorVersion;
    this.minorVersion = minorVersion;
    this.unused = unused;
    this.namedResources = Object.freeze([...namedResources]);
    this.resourceEntries = Object.freeze([...resourceEntries]);
    this.resources = Object.freeze([...resources]);

    // The first entry wins when an ID is listed twice
    const assetIdIndex = new Map<number, number>();
    this.resourceEntries.forEach((entry, index) => {
      if (!assetIdIndex.has(entry.assetId)) {
        assetIdIndex.set(entry.assetId, index);
      }
    });
    this.assetIdIndex = assetIdIndex;
  }

  static create(init: PakInit = {}): Pak {
    let pak = new Pak(
      init.majorVersion ?? 3,
      init.minorVersion ?? 5,
      init.unused ?? 0,
      init.namedResources ?? [],
      [],
      []
    );
    for (const [assetId, asset] of init.resources ?? []) {
      pak = pak.withResourceAppended(assetId, asset);
    }
    return pak;
  }

  static fromBytes(data: Uint8Array, registry: CodecRegistry = defaultCodecs): Pak {
    const header = StructTemplateParser.unpackRecord(data, 0, PAK_HEADER_TEMPLATE);

    const [namedResources, namedSize] = decodeRecords(
      namedResourceEntryCodec,
      data,
      PAK_HEADER_SIZE,
      numberField(header, 'namedResourceCount')
    );

    let pos = PAK_HEADER_SIZE + namedSize;
    const resourceCount = numberField(StructTemplateParser.unpackRecord(data, pos, COUNT_TEMPLATE), 'count');
    pos += COUNT_SIZE;

    const [resourceEntries] = decodeRecords(resourceEntryCodec, data, pos, resourceCount);

    const seen = new Set<number>();
    const resources = resourceEntries.map((entry, index) => {
      const end = entry.offset + entry.size;
      if (end > data.length) {
        throw new TruncatedPayloadError(
          `resource ${index} (${entry.assetType} ${formatAssetId(entry.assetId)}) spans ` +
          `${entry.offset}..${end}, past the ${data.length}-byte PAK`
        );
      }

      if (seen.has(entry.assetId)) {
        console.warn(`Asset ${formatAssetId(entry.assetId)} is listed more than once; lookups use the first entry`);
      }
      seen.add(entry.assetId);

      const payload = data.subarray(entry.offset, end);
      if (entry.compressed) {
        console.warn(`Keeping compressed ${entry.assetType} ${formatAssetId(entry.assetId)} as raw bytes`);
        return rawCodec.decode(payload, { entry });
      }
      return resolveCodec(registry, entry.assetType, entry.assetId).codec.decode(payload, { entry });
    });

    return new Pak(
      numberField(header, 'majorVersion'),
      numberField(header, 'minorVersion'),
      numberField(header, 'unused'),
      namedResources,
      resourceEntries,
      resources
    );
  }

  get namedResourceCount(): number {
    return this.namedResources.length;
  }

  get resourceCount(): number {
    return this.resources.length;
  }

  get directorySize(): number {
    return directorySize(this.namedResources, this.resourceCount);
  }

  /** Offset of the first payload: the directory rounded up to 32 bytes. */
  get resourcesStart(): number {
    return alignedLength(this.directorySize);
  }

  get encodedSize(): number {
    return this.resources.reduce(
      (total, resource) => total + alignedLength(resource.encodedSize),
      this.resourcesStart
    );
  }

  toBytes(): Uint8Array {
    const entries = layoutEntries(this.resourceEntries, this.resources, this.resourcesStart);

    return concatBytes([
      StructTemplateParser.packRecord(
        {
          majorVersion: this.majorVersion,
          minorVersion: this.minorVersion,
          unused: this.unused,
          namedResourceCount: this.namedResourceCount
        },
        PAK_HEADER_TEMPLATE
      ),
      encodeRecords(namedResourceEntryCodec, this.namedResources),
      StructTemplateParser.packRecord({ count: entries.length }, COUNT_TEMPLATE),
      encodeRecords(resourceEntryCodec, entries),
      padding(this.directorySize),
      ...this.resources.map(resource => padTo32(resource.encode()))
    ]);
  }

  has(assetId: number): boolean {
    return this.assetIdIndex.has(assetId);
  }

  indexOf(assetId: number): number {
    const index = this.assetIdIndex.get(assetId);
    if (index === undefined) {
      throw new UnknownIdentifierError('asset', assetId);
    }
    return index;
  }

  lookup(assetId: number): Asset {
    return this.resources[this.indexOf(assetId)];
  }

  entryFor(assetId: number): ResourceEntry {
    return this.resourceEntries[this.indexOf(assetId)];
  }

  findNamed(name: string): Asset {
    const named = this.namedResources.find(entry => entry.name === name);
    if (!named) {
      throw new UnknownIdentifierError('named resource', name);
    }
    return this.lookup(named.assetId);
  }

  // Every edit goes through here so offsets always match what toBytes writes
  private withLayout(
    namedResources: readonly NamedResourceEntry[],
    entries: readonly ResourceEntry[],
    resources: readonly Asset[]
  ): Pak {
    const resourcesStart = alignedLength(directorySize(namedResources, resources.length));
    return new Pak(
      this.majorVersion,
      this.minorVersion,
      this.unused,
      namedResources,
      layoutEntries(entries, resources, resourcesStart),
      resources
    );
  }

  /**
   * Inserts `asset` at `index`. It takes over the offset of the entry that was
   * there (or follows the last entry when appending) and everything after it
   * moves up by its padded size. New entries are never compressed.
   */
  withResourceInserted(index: number, assetId: number, asset: Asset): Pak {
    if (!Number.isInteger(index) || index < 0 || index > this.resourceCount) {
      throw new IndexOutOfRangeError(index, this.resourceCount);
    }
    checkAssetId(assetId);
    if (this.has(assetId)) {
      throw new DuplicateIdentifierError(assetId);
    }

    const entry: ResourceEntry = {
      compressed: false,
      assetType: asset.assetType,
      assetId,
      size: asset.encodedSize,
      offset: 0
    };

    return this.withLayout(
      this.namedResources,
      [...this.resourceEntries.slice(0, index), entry, ...this.resourceEntries.slice(index)],
      [...this.resources.slice(0, index), asset, ...this.resources.slice(index)]
    );
  }

  withResourceAppended(assetId: number, asset: Asset): Pak {
    return this.withResourceInserted(this.resourceCount, assetId, asset);
  }

  withResourceRemoved(index: number): Pak {
    if (!Number.isInteger(index) || index < 0 || index >= this.resourceCount) {
      throw new IndexOutOfRangeError(index, this.resourceCount - 1);
    }

    return this.withLayout(
      this.namedResources,
      this.resourceEntries.filter((_, i) => i !== index),
      this.resources.filter((_, i) => i !== index)
    );
  }

  withResourceRemovedByAssetId(assetId: number): Pak {
    const index = this.indexOf(assetId);
    return this.withResourceRemoved(index);
  }

  /**
   * Same result as removing the resource at `index` and inserting `asset` in
   * its place under the same ID.
   */
  withResourceReplaced(index: number, asset: Asset): Pak {
    if (!Number.isInteger(index) || index < 0 || index >= this.resourceCount) {
      throw new IndexOutOfRangeError(index, this.resourceCount - 1);
    }

    const replaced = this.resourceEntries[index];
    const entry: ResourceEntry = {
      compressed: false,
      assetType: asset.assetType,
      assetId: replaced.assetId,
      size: asset.encodedSize,
      offset: replaced.offset
    };

    return this.withLayout(
      this.namedResources,
      this.resourceEntries.map((existing, i) => (i === index ? entry : existing)),
      this.resources.map((existing, i) => (i === index ? asset : existing))
    );
  }

  withResourceReplacedByAssetId(assetId: number, asset: Asset): Pak {
    const index = this.indexOf(assetId);
    return this.withResourceReplaced(index, asset);
  }

  withNamedResourceAppended(entry: NamedResourceEntry): Pak {
    return this.withLayout([...this.namedResources, entry], this.resourceEntries, this.resources);
  }
}
