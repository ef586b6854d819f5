import { checkRawFields, err, ok, type BookRecord, type RawFields, type Result, type ValidationError } from '@shelfscan/scraper-sdk';
import { computeBookKey } from './fingerprint.js';

/**
 * Turn extracted fields into an immutable, keyed BookRecord.
 * Pure: no I/O, same input gives an equal record.
 */
export function validate(fields: RawFields): Result<BookRecord, ValidationError> {
  const checked = checkRawFields(fields);
  if (!checked.ok) {
    return err(checked.error);
  }

  const { title, author, upc } = checked.value;
  return ok(
    Object.freeze({
      ...checked.value,
      key: computeBookKey(title, author, upc),
    }),
  );
}
