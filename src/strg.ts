// STRG: per-language string tables with a shared name table

import type { Asset, AssetCodec, LanguageEntry, NameEntry } from './types.js';
import { StructTemplateParser, numberField } from './structtemplate.js';
import {
  LANGUAGE_ENTRY_SIZE,
  NAME_ENTRY_SIZE,
  decodeRecords,
  encodeRecords,
  encodedRecordsSize,
  languageEntryCodec,
  nameEntryCodec
} from './records.js';
import { concatBytes, padding, paddingFor } from './align.js';
import { encodeLatin1, encodeUtf16BE, readCString, readUtf16String, utf16ByteLength } from './textio.js';
import {
  IndexOutOfRangeError,
  MalformedHeaderError,
  TruncatedPayloadError,
  UnknownIdentifierError
} from './errors.js';

const STRG_HEADER_TEMPLATE = StructTemplateParser.fromTemplateString('>IIII:magic,version,languageCount,stringCount');
const NAME_TABLE_HEADER_TEMPLATE = StructTemplateParser.fromTemplateString('>II:count,size');

export const STRG_MAGIC = 0x87654321;
export const STRG_HEADER_SIZE = STRG_HEADER_TEMPLATE.recordLength;
export const NAME_TABLE_HEADER_SIZE = NAME_TABLE_HEADER_TEMPLATE.recordLength;
const OFFSET_SIZE = 4;

// Positions of `offsets` sorted by ascending offset, ties kept in index order
function byOffset(offsets: readonly number[]): number[] {
  return offsets
    .map((offset, index) => ({ offset, index }))
    .sort((a, b) => a.offset - b.offset || a.index - b.index)
    .map(({ index }) => index);
}

// Like byOffset, but an offset shared by several indices appears once
function distinctByOffset(offsets: readonly number[]): number[] {
  return byOffset(offsets).filter((index, i, sorted) => i === 0 || offsets[sorted[i - 1]] !== offsets[index]);
}

export class NameTable {
  readonly entries: readonly NameEntry[];
  readonly names: readonly string[];

  constructor(entries: readonly NameEntry[], names: readonly string[]) {
    if (entries.length !== names.length) {
      throw new MalformedHeaderError(`name table has ${entries.length} entries but ${names.length} names`);
    }
    this.entries = Object.freeze([...entries]);
    this.names = Object.freeze([...names]);
  }

  /** Lays the names out back to back in the given order. */
  static fromNames(names: Iterable<[string, number]>): NameTable {
    const pairs = [...names];
    // Offsets count from the end of the count/size header, so the entry list comes first
    let offset = pairs.length * NAME_ENTRY_SIZE;
    const entries = pairs.map(([name, stringIndex]) => {
      const entry: NameEntry = { offset, stringIndex };
      offset += encodeLatin1(name).length + 1;
      return entry;
    });
    return new NameTable(entries, pairs.map(([name]) => name));
  }

  /** Returns the table and the number of bytes it spans, as declared by its size field. */
  static fromBytes(data: Uint8Array, offset: number): [NameTable, number] {
    const header = StructTemplateParser.unpackRecord(data, offset, NAME_TABLE_HEADER_TEMPLATE);
    const count = numberField(header, 'count');
    const size = numberField(header, 'size');

    const regionStart = offset + NAME_TABLE_HEADER_SIZE;
    const regionEnd = regionStart + size;
    if (regionEnd > data.length) {
      throw new TruncatedPayloadError(
        `name table at offset ${offset} declares ${size} bytes, only ${data.length - regionStart} available`
      );
    }
    if (count * NAME_ENTRY_SIZE > size) {
      throw new MalformedHeaderError(`name table declares ${count} entries but only ${size} bytes`);
    }

    const region = data.subarray(regionStart, regionEnd);
    const [entries] = decodeRecords(nameEntryCodec, region, 0, count);
    const names = entries.map(entry => {
      if (entry.offset >= region.length) {
        throw new TruncatedPayloadError(`name offset ${entry.offset} is outside the ${size}-byte name table`);
      }
      return readCString(region, entry.offset);
    });

    return [new NameTable(entries, names), NAME_TABLE_HEADER_SIZE + size];
  }

  get count(): number {
    return this.entries.length;
  }

  /** Bytes after the count/size header: entry list plus null-terminated names. */
  get size(): number {
    return encodedRecordsSize(nameEntryCodec, this.entries) +
      distinctByOffset(this.entries.map(entry => entry.offset))
        .reduce((total, i) => total + encodeLatin1(this.names[i]).length + 1, 0);
  }

  get encodedSize(): number {
    return NAME_TABLE_HEADER_SIZE + this.size;
  }

  toBytes(): Uint8Array {
    return concatBytes([
      StructTemplateParser.packRecord({ count: this.count, size: this.size }, NAME_TABLE_HEADER_TEMPLATE),
      encodeRecords(nameEntryCodec, this.entries),
      ...distinctByOffset(this.entries.map(entry => entry.offset))
        .map(i => concatBytes([encodeLatin1(this.names[i]), new Uint8Array(1)]))
    ]);
  }

  stringIndexFor(name: string): number {
    const index = this.names.indexOf(name);
    if (index < 0) {
      throw new UnknownIdentifierError('string name', name);
    }
    return this.entries[index].stringIndex;
  }
}

export class StringTable {
  readonly offsets: readonly number[];
  readonly strings: readonly string[];

  constructor(offsets: readonly number[], strings: readonly string[]) {
    if (offsets.length !== strings.length) {
      throw new MalformedHeaderError(`string table has ${offsets.length} offsets but ${strings.length} strings`);
    }
    this.offsets = Object.freeze([...offsets]);
    this.strings = Object.freeze([...strings]);
  }

  static fromStrings(strings: readonly string[]): StringTable {
    const offsets: number[] = [];
    let offset = strings.length * OFFSET_SIZE;
    for (const str of strings) {
      offsets.push(offset);
      offset += utf16ByteLength(str) + 2;
    }
    return new StringTable(offsets, strings);
  }

  static fromBytes(data: Uint8Array, stringCount: number): StringTable {
    if (stringCount * OFFSET_SIZE > data.length) {
      throw new MalformedHeaderError(
        `string table of ${data.length} bytes can't hold ${stringCount} offsets`
      );
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const offsets: number[] = [];
    for (let i = 0; i < stringCount; i++) {
      offsets.push(view.getUint32(i * OFFSET_SIZE, false));
    }

    const strings = offsets.map(offset => {
      if (offset >= data.length) {
        throw new TruncatedPayloadError(`string offset ${offset} is outside the ${data.length}-byte string table`);
      }
      return readUtf16String(data, offset);
    });

    return new StringTable(offsets, strings);
  }

  get count(): number {
    return this.offsets.length;
  }

  get encodedSize(): number {
    return this.count * OFFSET_SIZE +
      distinctByOffset(this.offsets).reduce((total, i) => total + utf16ByteLength(this.strings[i]) + 2, 0);
  }

  toBytes(): Uint8Array {
    const offsetBytes = new Uint8Array(this.count * OFFSET_SIZE);
    const view = new DataView(offsetBytes.buffer);
    this.offsets.forEach((offset, i) => view.setUint32(i * OFFSET_SIZE, offset, false));

    // Strings are laid out in offset order, not index order, each shared offset once
    return concatBytes([
      offsetBytes,
      ...distinctByOffset(this.offsets).map(i => concatBytes([encodeUtf16BE(this.strings[i]), new Uint8Array(2)]))
    ]);
  }

  /**
   * Replaces one string. Every string stored after it (by offset) moves by
   * the difference in encoded length; strings stored before it keep their offsets.
   *
   * When other indices share the replaced string's offset they keep the old
   * text, and the new string gets its own slot right after it.
   */
  withStringReplaced(index: number, newString: string): StringTable {
    if (!Number.isInteger(index) || index < 0 || index >= this.count) {
      throw new IndexOutOfRangeError(index, this.count - 1);
    }

    const replacedOffset = this.offsets[index];
    const oldSize = utf16ByteLength(this.strings[index]) + 2;
    const newSize = utf16ByteLength(newString) + 2;
    const shared = this.offsets.some((offset, i) => i !== index && offset === replacedOffset);
    const shift = shared ? newSize : newSize - oldSize;

    return new StringTable(
      this.offsets.map((offset, i) => {
        if (i === index) {
          return shared ? replacedOffset + oldSize : offset;
        }
        return offset > replacedOffset ? offset + shift : offset;
      }),
      this.strings.map((str, i) => (i === index ? newString : str))
    );
  }
}

export interface StrgInit {
  magic?: number;
  version?: number;
  names?: Iterable<[string, number]>;
  languages: Iterable<[string, readonly string[]]>;
}

export class Strg implements Asset {
  readonly assetType = 'STRG';

  readonly magic: number;
  readonly version: number;
  readonly stringCount: number;
  readonly languages: readonly LanguageEntry[];
  readonly nameTable: NameTable;
  readonly stringTables: readonly StringTable[];

  private readonly languageIndex: ReadonlyMap<string, number>;

  constructor(
    magic: number,
    version: number,
    stringCount: number,
    languages: readonly LanguageEntry[],
    nameTable: NameTable,
    stringTables: readonly StringTable[]
  ) {
    if (languages.length !== stringTables.length) {
      throw new MalformedHeaderError(
        `STRG has ${languages.length} languages but ${stringTables.length} string tables`
      );
    }
    stringTables.forEach((table, i) => {
      if (table.count !== stringCount) {
        throw new MalformedHeaderError(
          `language ${languages[i].languageId} has ${table.count} strings, expected ${stringCount}`
        );
      }
    });

    this.magic = magic;
    this.version = version;
    this.stringCount = stringCount;
    this.languages = Object.freeze([...languages]);
    this.nameTable = nameTable;
    this.stringTables = Object.freeze([...stringTables]);

    const languageIndex = new Map<string, number>();
    this.languages.forEach((language, index) => {
      if (!languageIndex.has(language.languageId)) {
        languageIndex.set(language.languageId, index);
      }
    });
    this.languageIndex = languageIndex;
  }

  /** Builds a STRG with contiguous string tables in the given language order. */
  static create(init: StrgInit): Strg {
    const languageIds: string[] = [];
    const stringTables: StringTable[] = [];
    for (const [languageId, strings] of init.languages) {
      languageIds.push(languageId);
      stringTables.push(StringTable.fromStrings(strings));
    }
    const stringCount = stringTables.length > 0 ? stringTables[0].count : 0;

    return new Strg(
      init.magic ?? STRG_MAGIC,
      init.version ?? 0,
      stringCount,
      layoutLanguages(languageIds, stringTables),
      NameTable.fromNames(init.names ?? []),
      stringTables
    );
  }

  static fromBytes(data: Uint8Array): Strg {
    const header = StructTemplateParser.unpackRecord(data, 0, STRG_HEADER_TEMPLATE);
    const languageCount = numberField(header, 'languageCount');
    const stringCount = numberField(header, 'stringCount');

    const [languages, languagesSize] = decodeRecords(languageEntryCodec, data, STRG_HEADER_SIZE, languageCount);
    const [nameTable, nameTableSize] = NameTable.fromBytes(data, STRG_HEADER_SIZE + languagesSize);

    const stringTablesStart = STRG_HEADER_SIZE + languagesSize + nameTableSize;
    const stringTables = languages.map(language => {
      const start = stringTablesStart + language.stringsOffset;
      const end = start + language.stringsSize;
      if (end > data.length) {
        throw new TruncatedPayloadError(
          `string table for ${language.languageId} spans ${start}..${end}, past the ${data.length}-byte STRG`
        );
      }
      return StringTable.fromBytes(data.subarray(start, end), stringCount);
    });

    return new Strg(
      numberField(header, 'magic'),
      numberField(header, 'version'),
      stringCount,
      languages,
      nameTable,
      stringTables
    );
  }

  get languageCount(): number {
    return this.languages.length;
  }

  get languageIds(): string[] {
    return this.languages.map(language => language.languageId);
  }

  get contentSize(): number {
    return STRG_HEADER_SIZE +
      this.languageCount * LANGUAGE_ENTRY_SIZE +
      this.nameTable.encodedSize +
      this.stringTables.reduce((total, table) => total + table.encodedSize, 0);
  }

  get paddingSize(): number {
    return paddingFor(this.contentSize);
  }

  get encodedSize(): number {
    return this.contentSize + this.paddingSize;
  }

  encode(): Uint8Array {
    return this.toBytes();
  }

  toBytes(): Uint8Array {
    return concatBytes([
      StructTemplateParser.packRecord(
        {
          magic: this.magic,
          version: this.version,
          languageCount: this.languageCount,
          stringCount: this.stringCount
        },
        STRG_HEADER_TEMPLATE
      ),
      encodeRecords(languageEntryCodec, layoutLanguages(this.languageIds, this.stringTables)),
      this.nameTable.toBytes(),
      ...this.stringTables.map(table => table.toBytes()),
      padding(this.contentSize)
    ]);
  }

  private indexOfLanguage(languageId: string): number {
    const index = this.languageIndex.get(languageId);
    if (index === undefined) {
      throw new UnknownIdentifierError('language', languageId);
    }
    return index;
  }

  stringTable(languageId: string): StringTable {
    return this.stringTables[this.indexOfLanguage(languageId)];
  }

  resolveStringIndex(name: string): number {
    return this.nameTable.stringIndexFor(name);
  }

  getString(languageId: string, index: number): string {
    const table = this.stringTable(languageId);
    if (!Number.isInteger(index) || index < 0 || index >= table.count) {
      throw new IndexOutOfRangeError(index, table.count - 1);
    }
    return table.strings[index];
  }

  getStringByName(languageId: string, name: string): string {
    return this.getString(languageId, this.resolveStringIndex(name));
  }

  /**
   * Swaps in a new string table for one language. That language's size is
   * updated and every later language's offset moves by the size difference.
   */
  withStringTableReplaced(languageId: string, newTable: StringTable): Strg {
    const tableIndex = this.indexOfLanguage(languageId);
    const newSize = newTable.encodedSize;
    const sizeDiff = newSize - this.languages[tableIndex].stringsSize;

    const languages = this.languages.map((language, i) => {
      if (i < tableIndex) {
        return language;
      }
      if (i === tableIndex) {
        return { ...language, stringsSize: newSize };
      }
      return { ...language, stringsOffset: language.stringsOffset + sizeDiff };
    });

    return new Strg(
      this.magic,
      this.version,
      this.stringCount,
      languages,
      this.nameTable,
      this.stringTables.map((table, i) => (i === tableIndex ? newTable : table))
    );
  }

  withStringReplaced(languageId: string, index: number, newString: string): Strg {
    return this.withStringTableReplaced(languageId, this.stringTable(languageId).withStringReplaced(index, newString));
  }
}

// Language entries for string tables stored back to back in language order
function layoutLanguages(languageIds: readonly string[], stringTables: readonly StringTable[]): LanguageEntry[] {
  let stringsOffset = 0;
  return languageIds.map((languageId, i) => {
    const stringsSize = stringTables[i].encodedSize;
    const entry = { languageId, stringsOffset, stringsSize };
    stringsOffset += stringsSize;
    return entry;
  });
}

export const strgCodec: AssetCodec<Strg> = {
  decode(data: Uint8Array): Strg {
    return Strg.fromBytes(data);
  }
};
