import { ConflictException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';

export type DocumentPrefix = 'REC' | 'NC';

const MAX_ALLOCATION_ATTEMPTS = 5;

const pad = (value: number, width = 2): string =>
  String(value).padStart(width, '0');

/** `YYYYMMDDHHMMSS` in UTC */
export function formatTimestamp(date: Date): string {
  return (
    String(date.getUTCFullYear()) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

/** Shared by every number issued in the same second, e.g. `REC-20240615083000-` */
export function documentNumberStem(prefix: DocumentPrefix, now: Date): string {
  return `${prefix}-${formatTimestamp(now)}-`;
}

/**
 * Human-readable document numbers such as `REC-20240615083000-042`.
 * The sequence separates documents created in the same second.
 */
export function generateDocumentNumber(
  prefix: DocumentPrefix,
  now: Date,
  sequence: number,
): string {
  return `${documentNumberStem(prefix, now)}${pad(sequence, 3)}`;
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof QueryFailedError &&
    /UNIQUE constraint failed|duplicate key/i.test(error.message)
  );
}

/**
 * Insert a document under the next free number of the current second.
 *
 * `countIssued` counts the numbers already issued under a stem. When a
 * concurrent insert takes the same number first, the next one is tried.
 */
export async function insertWithDocumentNumber<T>(
  prefix: DocumentPrefix,
  countIssued: (stem: string) => Promise<number>,
  insert: (documentNumber: string) => Promise<T>,
  now: Date = new Date(),
): Promise<T> {
  const issued = await countIssued(documentNumberStem(prefix, now));

  for (let attempt = 1; attempt <= MAX_ALLOCATION_ATTEMPTS; attempt++) {
    try {
      return await insert(generateDocumentNumber(prefix, now, issued + attempt));
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
    }
  }
  throw new ConflictException(
    `Could not allocate a unique ${prefix} number; retry the request`,
  );
}
