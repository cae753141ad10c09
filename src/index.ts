export {
  assignIdentifiers,
  verifyIdentifier,
  findDuplicateLongIdentifiers,
  type AssignOptions,
  type AssignmentResult,
} from './identity/assigner.js';
export {
  createRecordPlanner,
  planRecord,
  type RecordPlan,
  type RecordPlanner,
} from './identity/policy.js';

export {
  CANONICAL_FORMAT,
  canonicalizeRecord,
  resolveFieldNames,
  hashName,
  type CanonicalField,
  type CanonicalRecord,
  type CanonicalizeOptions,
  type FieldName,
} from './utils/canonicalize.js';
export {
  cleanFieldName,
  canonicalizeNumber,
  inferFieldType,
  parseIsoDate,
  resolveValue,
  type ResolvedValue,
  type ValueTag,
} from './utils/normalize.js';
export {
  DIGEST_VERSIONS,
  DEFAULT_DIGEST_VERSION,
  digest,
  isDigestVersion,
  isValidIdentifier,
  abbreviateIdentifier,
  listDigestAlgorithms,
  type Digest,
  type DigestVersion,
} from './utils/digest.js';
export {
  IdentityError,
  UnresolvableTypeError,
  AmbiguousFieldNameError,
  UndefinedOrderError,
  EmptyInputError,
  NonUniqueIndexError,
  PolicyError,
  InvalidBatchError,
  type IdentityErrorCode,
} from './utils/errors.js';

export * from './schemas/record.js';
export * from './schemas/policy.js';
export * from './schemas/identifier.js';
