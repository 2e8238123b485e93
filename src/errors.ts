// Error types raised while decoding or editing PAK and STRG data

export class PakFormatError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = 'PakFormatError';
  }
}

export class MalformedHeaderError extends PakFormatError {
  constructor(message?: string) {
    super(message);
    this.name = 'MalformedHeaderError';
  }
}

export class TruncatedPayloadError extends PakFormatError {
  constructor(message?: string) {
    super(message);
    this.name = 'TruncatedPayloadError';
  }
}

export class MissingTerminatorError extends PakFormatError {
  constructor(message?: string) {
    super(message);
    this.name = 'MissingTerminatorError';
  }
}

export class UnknownIdentifierError extends PakFormatError {
  readonly identifier: string | number;

  constructor(kind: string, identifier: string | number) {
    const shown = typeof identifier === 'number'
      ? `0x${identifier.toString(16).toUpperCase().padStart(8, '0')}`
      : `'${identifier}'`;
    super(`No ${kind} ${shown}`);
    this.name = 'UnknownIdentifierError';
    this.identifier = identifier;
  }
}

export class IndexOutOfRangeError extends PakFormatError {
  constructor(index: number, max: number) {
    super(`Index ${index} is outside 0..${max}`);
    this.name = 'IndexOutOfRangeError';
  }
}

export class DuplicateIdentifierError extends PakFormatError {
  readonly identifier: number;

  constructor(identifier: number) {
    super(`Asset ID 0x${identifier.toString(16).toUpperCase().padStart(8, '0')} is already present`);
    this.name = 'DuplicateIdentifierError';
    this.identifier = identifier;
  }
}

export class InvalidIdentifierError extends PakFormatError {
  readonly identifier: number;

  constructor(identifier: number) {
    super(`Asset ID ${identifier} is not an integer in 0..0xFFFFFFFF`);
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
  }
}
