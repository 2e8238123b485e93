// Fixed-width directory records shared by PAK and STRG

import type { LanguageEntry, NameEntry, NamedResourceEntry, RecordCodec, ResourceEntry } from './types.js';
import { StructTemplateParser, numberField, stringField } from './structtemplate.js';
import type { StructTemplate } from './structtemplate.js';
import { MalformedHeaderError } from './errors.js';
import { decodeLatin1, encodeLatin1 } from './textio.js';
import { concatBytes } from './align.js';

const NAMED_RESOURCE_TEMPLATE = StructTemplateParser.fromTemplateString('>4sII:assetType,assetId,nameLength');
const RESOURCE_TEMPLATE = StructTemplateParser.fromTemplateString('>I4sIII:compressed,assetType,assetId,size,offset');
const LANGUAGE_TEMPLATE = StructTemplateParser.fromTemplateString('>4sII:languageId,stringsOffset,stringsSize');
const NAME_ENTRY_TEMPLATE = StructTemplateParser.fromTemplateString('>II:offset,stringIndex');

export const NAMED_RESOURCE_HEADER_SIZE = NAMED_RESOURCE_TEMPLATE.recordLength;
export const RESOURCE_ENTRY_SIZE = RESOURCE_TEMPLATE.recordLength;
export const LANGUAGE_ENTRY_SIZE = LANGUAGE_TEMPLATE.recordLength;
export const NAME_ENTRY_SIZE = NAME_ENTRY_TEMPLATE.recordLength;

// Records whose whole layout is one struct template
function fixedRecordCodec<T>(
  template: StructTemplate,
  fromStruct: (values: Record<string, number | string>) => T,
  toStruct: (record: T) => Record<string, number | string>
): RecordCodec<T> {
  return {
    decode(data: Uint8Array, offset: number): [T, number] {
      return [fromStruct(StructTemplateParser.unpackRecord(data, offset, template)), template.recordLength];
    },
    encode(record: T): Uint8Array {
      return StructTemplateParser.packRecord(toStruct(record), template);
    },
    encodedSize(_record: T): number {
      return template.recordLength;
    }
  };
}

export const resourceEntryCodec: RecordCodec<ResourceEntry> = fixedRecordCodec<ResourceEntry>(
  RESOURCE_TEMPLATE,
  values => ({
    compressed: numberField(values, 'compressed') !== 0,
    assetType: stringField(values, 'assetType'),
    assetId: numberField(values, 'assetId'),
    size: numberField(values, 'size'),
    offset: numberField(values, 'offset')
  }),
  entry => ({
    compressed: entry.compressed ? 1 : 0,
    assetType: entry.assetType,
    assetId: entry.assetId,
    size: entry.size,
    offset: entry.offset
  })
);

export const languageEntryCodec: RecordCodec<LanguageEntry> = fixedRecordCodec<LanguageEntry>(
  LANGUAGE_TEMPLATE,
  values => ({
    languageId: stringField(values, 'languageId'),
    stringsOffset: numberField(values, 'stringsOffset'),
    stringsSize: numberField(values, 'stringsSize')
  }),
  entry => ({ ...entry })
);

export const nameEntryCodec: RecordCodec<NameEntry> = fixedRecordCodec<NameEntry>(
  NAME_ENTRY_TEMPLATE,
  values => ({
    offset: numberField(values, 'offset'),
    stringIndex: numberField(values, 'stringIndex')
  }),
  entry => ({ ...entry })
);

/**
 * 12-byte prefix followed by exactly `nameLength` name bytes, no terminator.
 * `nameLength` is written as stored so decoded entries round-trip unchanged.
 */
export const namedResourceEntryCodec: RecordCodec<NamedResourceEntry> = {
  decode(data: Uint8Array, offset: number): [NamedResourceEntry, number] {
    const values = StructTemplateParser.unpackRecord(data, offset, NAMED_RESOURCE_TEMPLATE);
    const nameLength = numberField(values, 'nameLength');
    const nameStart = offset + NAMED_RESOURCE_HEADER_SIZE;

    if (nameStart + nameLength > data.length) {
      throw new MalformedHeaderError(
        `named resource at offset ${offset} declares a ${nameLength}-byte name past the end of the buffer`
      );
    }

    const entry: NamedResourceEntry = {
      assetType: stringField(values, 'assetType'),
      assetId: numberField(values, 'assetId'),
      nameLength,
      name: decodeLatin1(data.subarray(nameStart, nameStart + nameLength))
    };
    return [entry, NAMED_RESOURCE_HEADER_SIZE + nameLength];
  },

  encode(entry: NamedResourceEntry): Uint8Array {
    const name = checkedName(entry);
    return concatBytes([
      StructTemplateParser.packRecord({ ...entry }, NAMED_RESOURCE_TEMPLATE),
      name
    ]);
  },

  encodedSize(entry: NamedResourceEntry): number {
    return NAMED_RESOURCE_HEADER_SIZE + entry.nameLength;
  }
};

function checkedName(entry: NamedResourceEntry): Uint8Array {
  const name = encodeLatin1(entry.name);
  if (name.length !== entry.nameLength) {
    throw new MalformedHeaderError(
      `named resource '${entry.name}' is ${name.length} bytes but declares nameLength ${entry.nameLength}`
    );
  }
  return name;
}

/** Throws unless `nameLength` is the byte length of `name`. */
export function checkNamedResourceEntry(entry: NamedResourceEntry): void {
  checkedName(entry);
}

export function namedResourceEntry(assetType: string, assetId: number, name: string): NamedResourceEntry {
  return { assetType, assetId, nameLength: encodeLatin1(name).length, name };
}

export function decodeRecords<T>(
  codec: RecordCodec<T>,
  data: Uint8Array,
  offset: number,
  count: number
): [T[], number] {
  const records: T[] = [];
  let pos = offset;
  for (let i = 0; i < count; i++) {
    const [record, consumed] = codec.decode(data, pos);
    records.push(record);
    pos += consumed;
  }
  return [records, pos - offset];
}

export function encodeRecords<T>(codec: RecordCodec<T>, records: readonly T[]): Uint8Array {
  return concatBytes(records.map(record => codec.encode(record)));
}

export function encodedRecordsSize<T>(codec: RecordCodec<T>, records: readonly T[]): number {
  return records.reduce((size, record) => size + codec.encodedSize(record), 0);
}
