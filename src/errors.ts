export type CalendarErrorKind = 'malformedInput' | 'schema' | 'division' | 'input';

/**
 * Base class for every error that aborts a calendar run. The CLI reports
 * these as a one-line message; anything else is a bug and propagates.
 */
export class CalendarError extends Error {
  readonly kind: CalendarErrorKind;

  constructor(kind: CalendarErrorKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'CalendarError';
  }
}

/** Capacity summary lacks its expected layout or holds unusable totals. */
export class MalformedInputError extends CalendarError {
  constructor(message: string) {
    super('malformedInput', message);
    this.name = 'MalformedInputError';
  }
}

export class SchemaError extends CalendarError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      'schema',
      `Dispatch report is missing required column(s): ${missingColumns.join(', ')}`,
    );
    this.missingColumns = missingColumns;
    this.name = 'SchemaError';
  }
}

/** Monthly totals are empty or all zero, so pressure has no denominator. */
export class DivisionError extends CalendarError {
  constructor(message: string) {
    super('division', message);
    this.name = 'DivisionError';
  }
}

export class InputError extends CalendarError {
  constructor(message: string) {
    super('input', message);
    this.name = 'InputError';
  }
}

export function isCalendarError(err: unknown): err is CalendarError {
  return err instanceof CalendarError;
}
