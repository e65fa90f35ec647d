export type FareTableErrorCode = 'unreadable' | 'missing_columns' | 'empty_table';

export class FareTableError extends Error {
  readonly code: FareTableErrorCode;

  constructor(code: FareTableErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FareTableError';
    this.code = code;
  }
}

export class InputError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'InputError';
    this.field = field;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
