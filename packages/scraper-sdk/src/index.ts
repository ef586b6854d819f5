export type {
  Result,
  RawFieldName,
  RawFields,
  Availability,
  Price,
  CheckedBookFields,
  BookRecord,
  ListingPage,
  SourceManifest,
  CatalogSource,
} from './types.js';
export { ok, err, RAW_FIELD_NAMES, AVAILABILITY_VALUES } from './types.js';
export {
  checkRawFields,
  toAvailability,
  textSchema,
  priceAmountSchema,
  currencySchema,
  ratingSchema,
  stockUnitsSchema,
  httpUrlSchema,
} from './schema.js';
export {
  EnumerationError,
  FetchError,
  ExtractionError,
  ValidationError,
  StoreError,
  ConfigurationError,
} from './errors.js';
export type { FetchErrorKind, ValidationErrorKind, StoreErrorKind } from './errors.js';
export { defineSource } from './factory.js';
