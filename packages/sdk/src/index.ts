/**
 * datamap SDK
 *
 * Insertion-ordered records keyed by integer id, with lookup by (language, name)
 */

export type {
  FieldValue,
  NameTranslations,
  RawFields,
  NameCollisionPolicy,
  DataMapOptions,
  DataMapStats,
  NameIndexOwner,
} from "./types.js";

export { DataMap } from "./datamap.js";
export { DataRow } from "./row.js";
export { NameSet } from "./name-set.js";

export {
  FieldValueSchema,
  NameTranslationsSchema,
  EntryIdSchema,
  RawFieldsSchema,
  formatIssues,
  parseEntryId,
  parseNameTranslations,
} from "./schemas.js";

export {
  DataMapError,
  MissingFieldError,
  DuplicateKeyError,
  KeyNotFoundError,
  InvalidEntryError,
} from "./errors.js";

export { logger } from "./observability/logs.js";
export { formatLogLine } from "./observability/logs.js";
export type { LogLevel, DataMapLogEvent, DataMapLogEvents } from "./observability/logs.js";
export { metrics } from "./observability/metrics.js";
export type { LookupMetrics, MetricsSnapshot } from "./observability/metrics.js";
