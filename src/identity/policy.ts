import { Batch, DataRecord } from '../schemas/record.js';
import {
  CanonicalizationConfig,
  CompositePolicy,
  ContentHashPolicy,
  IdentityPolicy,
  SequentialPolicy,
} from '../schemas/policy.js';
import { CanonicalRecord, canonicalizeRecord, hashName, resolveFieldNames } from '../utils/canonicalize.js';
import { DigestVersion } from '../utils/digest.js';
import { PolicyError, UndefinedOrderError } from '../utils/errors.js';

/**
 * What the policy decided for one record: either a finished sequential id,
 * or the canonical input(s) the digest engine has to hash.
 */
export type RecordPlan =
  | { kind: 'sequential'; ordinal: number; id: string }
  | { kind: 'content-hash'; algorithm: DigestVersion; canonical: CanonicalRecord }
  | { kind: 'composite'; algorithm: DigestVersion; long: CanonicalRecord; short: CanonicalRecord };

export type RecordPlanner = (record: DataRecord, recordIndex: number) => RecordPlan;

function sequentialPlanner(batch: Batch, policy: SequentialPolicy): RecordPlanner {
  if (batch.order !== 'stable') {
    throw new UndefinedOrderError(
      `batch '${batch.datasetTag}' is not marked order: 'stable'`,
      { datasetTag: batch.datasetTag, order: batch.order ?? null }
    );
  }

  const scope = policy.datasetScoped ? `${batch.datasetTag}:` : '';

  return (record, recordIndex) => {
    if (record.ordinal === undefined) {
      throw new UndefinedOrderError(`record ${recordIndex} has no ordinal`, { recordIndex });
    }
    if (!Number.isSafeInteger(record.ordinal) || record.ordinal < 0) {
      throw new UndefinedOrderError(
        `record ${recordIndex} has ordinal ${record.ordinal}, expected an integer >= 0`,
        { recordIndex, ordinal: record.ordinal }
      );
    }
    return {
      kind: 'sequential',
      ordinal: record.ordinal,
      id: `${policy.prefix}${scope}${policy.start + record.ordinal}`,
    };
  };
}

/**
 * Selector for a named field subset. Every listed name must be present in
 * the record; a silently missing field would change what the id covers.
 */
function subsetSelector(
  names: readonly string[],
  config: CanonicalizationConfig,
  path: string
): (record: DataRecord, recordIndex: number) => (hashedName: string) => boolean {
  const wanted = new Set(names.map(name => hashName(name, config.nameMode)));

  return (record, recordIndex) => {
    const present = new Set(
      resolveFieldNames(record, config.nameMode, recordIndex).map(n => n.hashedName)
    );
    const missing = [...wanted].filter(name => !present.has(name));
    if (missing.length > 0) {
      throw new PolicyError(
        missing.map(name => `${path}: record has no field '${name}'`),
        { recordIndex }
      );
    }
    return hashedName => wanted.has(hashedName);
  };
}

function contentHashPlanner(batch: Batch, policy: ContentHashPolicy): RecordPlanner {
  const config = policy.canonicalization;
  const datasetTag = policy.datasetScoped ? batch.datasetTag : undefined;
  const subset = policy.fieldSubset;
  const algorithm = policy.hashAlgorithmVersion;

  if (subset === 'all') {
    return (record, recordIndex) => ({
      kind: 'content-hash',
      algorithm,
      canonical: canonicalizeRecord(record, { config, datasetTag, recordIndex }),
    });
  }

  if ('include' in subset) {
    const select = subsetSelector(subset.include, config, 'fieldSubset.include');
    return (record, recordIndex) => ({
      kind: 'content-hash',
      algorithm,
      canonical: canonicalizeRecord(record, {
        config,
        datasetTag,
        recordIndex,
        selectField: select(record, recordIndex),
      }),
    });
  }

  const excluded = new Set(subset.exclude.map(name => hashName(name, config.nameMode)));
  return (record, recordIndex) => ({
    kind: 'content-hash',
    algorithm,
    canonical: canonicalizeRecord(record, {
      config,
      datasetTag,
      recordIndex,
      selectField: hashedName => !excluded.has(hashedName),
    }),
  });
}

function compositePlanner(batch: Batch, policy: CompositePolicy): RecordPlanner {
  const config = policy.canonicalization;
  const select = subsetSelector(policy.shortFields, config, 'shortFields');
  const shortTag = policy.shortDatasetScoped ? batch.datasetTag : undefined;

  return (record, recordIndex) => ({
    kind: 'composite',
    algorithm: policy.hashAlgorithmVersion,
    long: canonicalizeRecord(record, { config, datasetTag: batch.datasetTag, recordIndex }),
    short: canonicalizeRecord(record, {
      config,
      datasetTag: shortTag,
      recordIndex,
      selectField: select(record, recordIndex),
    }),
  });
}

/**
 * Build the per-record planner for a batch. Batch-level preconditions (a
 * declared stable order for sequential ids) are checked here, once.
 */
export function createRecordPlanner(batch: Batch, policy: IdentityPolicy): RecordPlanner {
  switch (policy.mode) {
    case 'sequential':
      return sequentialPlanner(batch, policy);
    case 'content-hash':
      return contentHashPlanner(batch, policy);
    case 'composite':
      return compositePlanner(batch, policy);
  }
}

export function planRecord(
  record: DataRecord,
  recordIndex: number,
  batch: Batch,
  policy: IdentityPolicy
): RecordPlan {
  return createRecordPlanner(batch, policy)(record, recordIndex);
}
