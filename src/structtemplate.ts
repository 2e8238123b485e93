// Struct templates for the fixed-width big-endian records of PAK and STRG

import { MalformedHeaderError } from './errors.js';
import { decodeLatin1, encodeLatin1 } from './textio.js';

export type StructValue = number | string;

export type StructRecord = Record<string, StructValue>;

export interface StructTemplate {
  format: string;
  fields: string[];
  fieldNames: (string | null)[];
  recordLength: number;
}

export class StructTemplateParser {
  /**
   * Parses `format:name,name,...`, e.g. `>4sII:assetType,assetId,nameLength`.
   * Supported codes: `H` u16, `I` u32, `Ns` N-byte text.
   * Only big-endian layouts exist in these formats, so `>` is implied.
   */
  static fromTemplateString(template: string): StructTemplate {
    const split = template.split(':', 2);

    const formatStr = split[0];
    const fieldNames = split.length > 1 ? split[1].split(',') : [];

    if (!formatStr) {
      throw new Error('Empty format string');
    }

    return new StructTemplateParser(formatStr, fieldNames).build();
  }

  private formatStr: string;
  private fieldNames: string[];

  constructor(formatStr: string, fieldNames: string[]) {
    this.formatStr = formatStr.trim();
    this.fieldNames = fieldNames.map(name => name.trim());

    if (this.formatStr.startsWith('<')) {
      throw new Error('Little-endian struct formats are not supported');
    }
    if (!this.formatStr.startsWith('>')) {
      this.formatStr = '>' + this.formatStr;
    }
  }

  build(): StructTemplate {
    const fields = StructTemplateParser.splitStructFormatFields(this.formatStr);
    return {
      format: this.formatStr,
      fields,
      fieldNames: this.expandFieldNames(fields),
      recordLength: fields.reduce((length, field) => length + fieldLength(field), 0)
    };
  }

  private static splitStructFormatFields(fmt: string): string[] {
    const fields: string[] = [];
    let repeat = 0;

    for (const c of fmt.replace(/^>/, '')) {
      if (/\s/.test(c)) {
        continue;
      }

      // Repeat count
      if (/\d/.test(c)) {
        repeat = repeat * 10 + parseInt(c, 10);
        continue;
      }

      if (c === 'H' || c === 'I') {
        for (let j = 0; j < Math.max(repeat, 1); j++) {
          fields.push(c);
        }
      } else if (c === 's') {
        fields.push(`${Math.max(repeat, 1)}s`);
      } else {
        throw new Error(`Unsupported struct format character '${c}'`);
      }
      repeat = 0;
    }

    return fields;
  }

  private expandFieldNames(fields: string[]): (string | null)[] {
    const result: (string | null)[] = [];
    let fieldNameIndex = 0;

    for (const field of fields) {
      result.push(this.fieldNames[fieldNameIndex] || null);
      fieldNameIndex++;
    }

    if (fieldNameIndex < this.fieldNames.length) {
      throw new Error(`Struct format '${this.formatStr}' has fewer fields than names (${this.fieldNames.join(',')})`);
    }

    return result;
  }

  static unpackRecord(data: Uint8Array, offset: number, template: StructTemplate): StructRecord {
    if (offset < 0 || offset + template.recordLength > data.length) {
      throw new MalformedHeaderError(
        `${template.format} record at offset ${offset} needs ${template.recordLength} bytes, ` +
        `only ${Math.max(data.length - offset, 0)} available`
      );
    }

    const view = new DataView(data.buffer, data.byteOffset + offset, template.recordLength);
    const result: StructRecord = {};
    let pos = 0;

    template.fields.forEach((field, i) => {
      let value: StructValue;
      switch (field) {
        case 'H':
          value = view.getUint16(pos, false);
          break;
        case 'I':
          value = view.getUint32(pos, false);
          break;
        default:
          value = decodeLatin1(data.subarray(offset + pos, offset + pos + fieldLength(field)));
      }
      pos += fieldLength(field);

      const fieldName = template.fieldNames[i];
      if (fieldName !== null) {
        result[fieldName] = value;
      }
    });

    return result;
  }

  static packRecord(record: StructRecord, template: StructTemplate): Uint8Array {
    const result = new Uint8Array(template.recordLength);
    const view = new DataView(result.buffer);
    let pos = 0;

    template.fields.forEach((field, i) => {
      const fieldName = template.fieldNames[i];
      const length = fieldLength(field);

      if (fieldName === null) {
        pos += length;
        return;
      }

      switch (field) {
        case 'H':
          view.setUint16(pos, unsignedField(record, fieldName, 0xFFFF), false);
          break;
        case 'I':
          view.setUint32(pos, unsignedField(record, fieldName, 0xFFFFFFFF), false);
          break;
        default: {
          const encoded = encodeLatin1(stringField(record, fieldName));
          if (encoded.length > length) {
            throw new Error(`'${fieldName}' doesn't fit in ${length} bytes`);
          }
          result.set(encoded, pos);
        }
      }
      pos += length;
    });

    return result;
  }
}

function fieldLength(field: string): number {
  switch (field) {
    case 'H':
      return 2;
    case 'I':
      return 4;
    default:
      if (field.endsWith('s')) {
        return parseInt(field.slice(0, -1), 10);
      }
      throw new Error(`Unknown field type: ${field}`);
  }
}

export function numberField(record: StructRecord, name: string): number {
  const value = record[name];
  if (typeof value !== 'number') {
    throw new Error(`Struct field '${name}' is ${value === undefined ? 'missing' : 'not a number'}`);
  }
  return value;
}

// DataView setters wrap out-of-range values silently
function unsignedField(record: StructRecord, name: string, max: number): number {
  const value = numberField(record, name);
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new MalformedHeaderError(`Struct field '${name}' value ${value} is outside 0..${max}`);
  }
  return value;
}

export function stringField(record: StructRecord, name: string): string {
  const value = record[name];
  if (typeof value !== 'string') {
    throw new Error(`Struct field '${name}' is ${value === undefined ? 'missing' : 'not a string'}`);
  }
  return value;
}
