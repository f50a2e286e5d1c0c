export {
  normalizeRow,
  normalizeRows,
  coerceToIds,
  SourceRowSchema,
  IDENTITY_FIELDS,
  type SourceRow,
  type NormalizeOptions,
  type NormalizeResult,
} from './normalizer.js';
