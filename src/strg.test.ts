import { describe, it, expect } from 'vitest';
import { NameTable, STRG_MAGIC, Strg, StringTable, strgCodec } from './strg.js';
import {
  IndexOutOfRangeError,
  MalformedHeaderError,
  MissingTerminatorError,
  TruncatedPayloadError,
  UnknownIdentifierError
} from './errors.js';
import { fromHex, toHex } from './textio.js';

// Two languages, one string each, one name
const STRG_HEX = [
  '87654321', '00000000', '00000002', '00000001',
  '454E474C', '00000000', '0000000A',
  '4652454E', '0000000A', '00000010',
  '00000001', '0000000E', '00000008', '00000000', '5449544C4500',
  '00000004', '00480069', '0000',
  '00000004', '00530061006C00750074', '0000',
  'FF'.repeat(8)
].join('');

function sampleStrg(): Strg {
  return Strg.create({
    names: [['TITLE', 0]],
    languages: [
      ['ENGL', ['Hi']],
      ['FREN', ['Salut']]
    ]
  });
}

describe('StringTable', () => {
  it('should lay strings out after the offset list', () => {
    const table = StringTable.fromStrings(['one', 'two', 'three']);

    expect(table.offsets).toEqual([12, 20, 28]);
    expect(table.count).toBe(3);
    expect(table.encodedSize).toBe(40);
    expect(table.toBytes().length).toBe(40);
  });

  it('should decode strings by following their offsets', () => {
    const table = StringTable.fromBytes(fromHex('00000004' + '00480069' + '0000'), 1);

    expect(table.offsets).toEqual([4]);
    expect(table.strings).toEqual(['Hi']);
  });

  it('should write strings in offset order rather than index order', () => {
    const table = new StringTable([12, 8], ['B', 'A']);
    const bytes = table.toBytes();

    expect(toHex(bytes)).toBe('0000000C' + '00000008' + '00410000' + '00420000');
    expect(StringTable.fromBytes(bytes, 2)).toEqual(table);
  });

  it('should shift later offsets by the size difference when a string grows', () => {
    const table = StringTable.fromStrings(['one', 'two', 'three']);
    const replaced = table.withStringReplaced(1, 'twenty');

    expect(replaced.offsets).toEqual([12, 20, 34]);
    expect(replaced.strings).toEqual(['one', 'twenty', 'three']);
    expect(replaced.encodedSize - table.encodedSize).toBe(6);
    expect(StringTable.fromBytes(replaced.toBytes(), 3)).toEqual(replaced);
  });

  it('should shift later offsets down when a string shrinks', () => {
    const table = StringTable.fromStrings(['alpha', 'beta', 'gamma']);
    const replaced = table.withStringReplaced(0, '');

    expect(replaced.offsets).toEqual([12, 14, 24]);
    expect(replaced.encodedSize - table.encodedSize).toBe(-10);
    expect(StringTable.fromBytes(replaced.toBytes(), 3).strings).toEqual(['', 'beta', 'gamma']);
  });

  it('should move strings stored after the replaced one even when indices run backwards', () => {
    const replaced = new StringTable([12, 8], ['B', 'A']).withStringReplaced(1, 'AA');

    expect(replaced.offsets).toEqual([14, 8]);
    expect(StringTable.fromBytes(replaced.toBytes(), 2).strings).toEqual(['B', 'AA']);
  });

  it('should write a string shared by several indices once', () => {
    const bytes = fromHex('00000008' + '00000008' + '00410000');
    const table = StringTable.fromBytes(bytes, 2);

    expect(table.strings).toEqual(['A', 'A']);
    expect(table.encodedSize).toBe(12);
    expect(table.toBytes()).toEqual(bytes);
  });

  it('should give a replaced string its own slot when its offset is shared', () => {
    const table = StringTable.fromBytes(fromHex('00000008' + '00000008' + '00410000'), 2);
    const replaced = table.withStringReplaced(0, 'BB');

    expect(replaced.offsets).toEqual([12, 8]);
    expect(replaced.encodedSize).toBe(18);
    expect(toHex(replaced.toBytes())).toBe('0000000C' + '00000008' + '00410000' + '004200420000');
    expect(StringTable.fromBytes(replaced.toBytes(), 2).strings).toEqual(['BB', 'A']);
  });

  it('should shift strings after a shared slot by the whole new string', () => {
    const table = StringTable.fromBytes(fromHex('0000000C' + '0000000C' + '00000010' + '00410000' + '00430000'), 3);
    const replaced = table.withStringReplaced(1, 'BB');

    expect(replaced.offsets).toEqual([12, 16, 22]);
    expect(StringTable.fromBytes(replaced.toBytes(), 3).strings).toEqual(['A', 'BB', 'C']);
  });

  it('should reject indices outside the table', () => {
    const table = StringTable.fromStrings(['only']);
    expect(() => table.withStringReplaced(1, 'x')).toThrow(IndexOutOfRangeError);
    expect(() => table.withStringReplaced(-1, 'x')).toThrow(IndexOutOfRangeError);
  });

  it('should fail on bad tables', () => {
    expect(() => StringTable.fromBytes(fromHex('00000004'), 2)).toThrow(MalformedHeaderError);
    expect(() => StringTable.fromBytes(fromHex('00000010' + '0041' + '0000'), 1)).toThrow(TruncatedPayloadError);
    expect(() => StringTable.fromBytes(fromHex('00000004' + '0041'), 1)).toThrow(MissingTerminatorError);
    expect(() => new StringTable([4], [])).toThrow(MalformedHeaderError);
  });
});

describe('NameTable', () => {
  it('should place names after the entry list', () => {
    const table = NameTable.fromNames([['TITLE', 0], ['BODY', 1]]);

    expect(table.entries).toEqual([{ offset: 16, stringIndex: 0 }, { offset: 22, stringIndex: 1 }]);
    expect(table.size).toBe(27);
    expect(table.encodedSize).toBe(35);
    expect(toHex(table.toBytes())).toBe(
      '00000002' + '0000001B' +
      '00000010' + '00000000' + '00000016' + '00000001' +
      '5449544C4500' + '424F445900'
    );
  });

  it('should report the bytes it spans', () => {
    const table = NameTable.fromNames([['TITLE', 0], ['BODY', 1]]);
    const bytes = table.toBytes();
    const [decoded, consumed] = NameTable.fromBytes(bytes, 0);

    expect(decoded).toEqual(table);
    expect(consumed).toBe(bytes.length);
  });

  it('should write a name shared by several entries once', () => {
    const bytes = fromHex('00000002' + '00000012' + '00000010' + '00000000' + '00000010' + '00000001' + '5800');
    const [table, consumed] = NameTable.fromBytes(bytes, 0);

    expect(table.names).toEqual(['X', 'X']);
    expect(consumed).toBe(26);
    expect(table.toBytes()).toEqual(bytes);
  });

  it('should resolve names to string indices', () => {
    const table = NameTable.fromNames([['TITLE', 0], ['BODY', 4]]);
    expect(table.stringIndexFor('BODY')).toBe(4);
    expect(() => table.stringIndexFor('FOOTER')).toThrow(UnknownIdentifierError);
  });

  it('should fail when the declared size runs past the buffer', () => {
    expect(() => NameTable.fromBytes(fromHex('00000001' + '00000040' + '00000008'), 0)).toThrow(TruncatedPayloadError);
  });

  it('should fail when a name has no terminator', () => {
    expect(() => NameTable.fromBytes(fromHex('00000001' + '0000000A' + '00000008' + '00000000' + '4142'), 0))
      .toThrow(MissingTerminatorError);
  });
});

describe('Strg', () => {
  it('should decode a two-language table', () => {
    const strg = Strg.fromBytes(fromHex(STRG_HEX));

    expect(strg.magic).toBe(STRG_MAGIC);
    expect(strg.version).toBe(0);
    expect(strg.languageCount).toBe(2);
    expect(strg.stringCount).toBe(1);
    expect(strg.languages).toEqual([
      { languageId: 'ENGL', stringsOffset: 0, stringsSize: 10 },
      { languageId: 'FREN', stringsOffset: 10, stringsSize: 16 }
    ]);
    expect(strg.nameTable.names).toEqual(['TITLE']);
    expect(strg.stringTable('ENGL').strings).toEqual(['Hi']);
    expect(strg.stringTable('FREN').strings).toEqual(['Salut']);
  });

  it('should re-encode byte for byte', () => {
    const bytes = fromHex(STRG_HEX);
    expect(Strg.fromBytes(bytes).toBytes()).toEqual(bytes);
  });

  it('should build the same bytes from scratch', () => {
    const strg = sampleStrg();

    expect(strg.contentSize).toBe(88);
    expect(strg.paddingSize).toBe(8);
    expect(strg.encodedSize).toBe(96);
    expect(toHex(strg.toBytes())).toBe(STRG_HEX);
    expect(Strg.fromBytes(strg.toBytes())).toEqual(strg);
  });

  it('should look strings up by language and name', () => {
    const strg = sampleStrg();

    expect(strg.languageIds).toEqual(['ENGL', 'FREN']);
    expect(strg.resolveStringIndex('TITLE')).toBe(0);
    expect(strg.getString('ENGL', 0)).toBe('Hi');
    expect(strg.getStringByName('FREN', 'TITLE')).toBe('Salut');
    expect(() => strg.stringTable('GERM')).toThrow(UnknownIdentifierError);
    expect(() => strg.resolveStringIndex('MISSING')).toThrow(UnknownIdentifierError);
    expect(() => strg.getString('ENGL', 1)).toThrow(IndexOutOfRangeError);
  });

  it('should grow one language and shift the ones after it', () => {
    const strg = sampleStrg();
    const edited = strg.withStringReplaced('ENGL', 0, 'Hello');

    expect(edited.languages).toEqual([
      { languageId: 'ENGL', stringsOffset: 0, stringsSize: 16 },
      { languageId: 'FREN', stringsOffset: 16, stringsSize: 16 }
    ]);
    expect(edited.stringTable('FREN')).toBe(strg.stringTable('FREN'));
    expect(edited.getString('FREN', 0)).toBe('Salut');
    expect(edited.nameTable).toBe(strg.nameTable);
    expect(edited.encodedSize).toBe(96);
    expect(Strg.fromBytes(edited.toBytes())).toEqual(edited);
  });

  it('should shift later languages down when a table shrinks', () => {
    const strg = sampleStrg();
    const edited = strg.withStringTableReplaced('ENGL', StringTable.fromStrings(['']));

    expect(edited.languages).toEqual([
      { languageId: 'ENGL', stringsOffset: 0, stringsSize: 6 },
      { languageId: 'FREN', stringsOffset: 6, stringsSize: 16 }
    ]);
    expect(edited.contentSize).toBe(84);
    expect(Strg.fromBytes(edited.toBytes()).stringTable('FREN').strings).toEqual(['Salut']);
  });

  it('should leave earlier languages alone', () => {
    const strg = sampleStrg();
    const edited = strg.withStringReplaced('FREN', 0, 'Bonjour à tous');

    expect(edited.languages[0]).toBe(strg.languages[0]);
    expect(edited.languages[1]).toEqual({ languageId: 'FREN', stringsOffset: 10, stringsSize: 34 });
  });

  it('should reject tables with a different string count', () => {
    const strg = sampleStrg();
    expect(() => strg.withStringTableReplaced('ENGL', StringTable.fromStrings(['a', 'b'])))
      .toThrow(MalformedHeaderError);
  });

  it('should fail on truncated data', () => {
    const bytes = fromHex(STRG_HEX);
    expect(() => Strg.fromBytes(bytes.subarray(0, 30))).toThrow(MalformedHeaderError);
    expect(() => Strg.fromBytes(bytes.subarray(0, 80))).toThrow(TruncatedPayloadError);
  });

  it('should decode through its codec', () => {
    const entry = { compressed: false, assetType: 'STRG', assetId: 1, size: 96, offset: 0 };
    const strg = strgCodec.decode(fromHex(STRG_HEX), { entry });

    expect(strg).toBeInstanceOf(Strg);
    expect(strg.assetType).toBe('STRG');
  });
});
