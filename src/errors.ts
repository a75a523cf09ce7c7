export class TocError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'TocError';
  }
}

export class UnsupportedFormatError extends TocError {
  constructor(public readonly format: string, supported: string[]) {
    super(`Unsupported format "${format}" (supported: ${supported.join(', ')})`);
    this.name = 'UnsupportedFormatError';
  }
}

export class InvalidOptionError extends TocError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptionError';
  }
}

export class UsageError extends TocError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
