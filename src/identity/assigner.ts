import { Batch } from '../schemas/record.js';
import { IdentityPolicy, IdentityPolicyInput, PolicyKind, parsePolicy } from '../schemas/policy.js';
import {
  CollisionReport,
  DuplicateLongIdentifier,
  Identifier,
  primaryId,
} from '../schemas/identifier.js';
import { RecordPlan, createRecordPlanner } from './policy.js';
import { abbreviateIdentifier, digest } from '../utils/digest.js';
import { InvalidBatchError, NonUniqueIndexError } from '../utils/errors.js';

/**
 * Batch identity assignment
 *
 * One deterministic pass: plan and hash each record in batch order, then a
 * single collision scan once every identifier exists. Nothing is retried,
 * reordered or persisted; the first failing record fails the whole call.
 */

export interface AssignOptions {
  /** Receives a summary line per batch and a line per duplicate group */
  verbose?: (message: string) => void;
}

export interface AssignmentResult {
  policyKind: PolicyKind;
  datasetTag: string;
  identifiers: Identifier[];
  collisions: CollisionReport;
}

function toIdentifier(plan: RecordPlan, recordIndex: number): Identifier {
  switch (plan.kind) {
    case 'sequential':
      return { kind: 'sequential', recordIndex, id: plan.id, ordinal: plan.ordinal };

    case 'content-hash': {
      const { id, algorithm } = digest(plan.canonical.bytes, plan.algorithm);
      return {
        kind: 'content-hash',
        recordIndex,
        id,
        algorithm,
        canonicalByteLength: plan.canonical.bytes.length,
      };
    }

    case 'composite': {
      const long = digest(plan.long.bytes, plan.algorithm);
      const short = digest(plan.short.bytes, plan.algorithm);
      return {
        kind: 'composite',
        recordIndex,
        algorithm: long.algorithm,
        long: { id: long.id, canonicalByteLength: plan.long.bytes.length },
        short: { id: short.id, canonicalByteLength: plan.short.bytes.length },
      };
    }
  }
}

function assertUniqueOrdinals(identifiers: Identifier[]): void {
  const byOrdinal = new Map<number, number>();
  for (const identifier of identifiers) {
    if (identifier.kind !== 'sequential') continue;

    const first = byOrdinal.get(identifier.ordinal);
    if (first !== undefined) {
      throw new NonUniqueIndexError(identifier.ordinal, [first, identifier.recordIndex]);
    }
    byOrdinal.set(identifier.ordinal, identifier.recordIndex);
  }
}

/**
 * Group records that share a long identifier, in order of first appearance
 */
export function findDuplicateLongIdentifiers(identifiers: Identifier[]): DuplicateLongIdentifier[] {
  const groups = new Map<string, number[]>();
  for (const identifier of identifiers) {
    const id = primaryId(identifier);
    const indices = groups.get(id);
    if (indices) {
      indices.push(identifier.recordIndex);
    } else {
      groups.set(id, [identifier.recordIndex]);
    }
  }

  const duplicates: DuplicateLongIdentifier[] = [];
  for (const [id, recordIndices] of groups) {
    if (recordIndices.length > 1) {
      duplicates.push({ code: 'DuplicateLongIdentifier', id, recordIndices });
    }
  }
  return duplicates;
}

function buildCollisionReport(identifiers: Identifier[], policy: IdentityPolicy): CollisionReport {
  if (policy.mode === 'sequential') {
    assertUniqueOrdinals(identifiers);
    return { duplicateLongIdentifiers: [] };
  }

  const report: CollisionReport = {
    duplicateLongIdentifiers: findDuplicateLongIdentifiers(identifiers),
  };

  if (policy.mode === 'composite') {
    const shortIds = new Set<string>();
    for (const identifier of identifiers) {
      if (identifier.kind === 'composite') shortIds.add(identifier.short.id);
    }
    report.distinctShortIdentifiers = shortIds.size;
  }

  return report;
}

export function assignIdentifiers(
  batch: Batch,
  policyInput: IdentityPolicyInput,
  options: AssignOptions = {}
): AssignmentResult {
  const policy = parsePolicy(policyInput);
  const plan = createRecordPlanner(batch, policy);

  const identifiers = batch.records.map((record, recordIndex) =>
    toIdentifier(plan(record, recordIndex), recordIndex)
  );

  const collisions = buildCollisionReport(identifiers, policy);

  const log = options.verbose;
  if (log) {
    log(
      `[${batch.datasetTag}] assigned ${identifiers.length} ${policy.mode} identifiers, ` +
        `${collisions.duplicateLongIdentifiers.length} duplicate group(s)`
    );
    for (const group of collisions.duplicateLongIdentifiers) {
      log(`[${batch.datasetTag}] duplicate long identifier ${abbreviateIdentifier(group.id)} on records ${group.recordIndices.join(', ')}`);
    }
  }

  return {
    policyKind: policy.mode,
    datasetTag: batch.datasetTag,
    identifiers,
    collisions,
  };
}

/**
 * Recompute one record's identifier and compare it with a stored one.
 *
 * Used on reprocessing to confirm an identifier is still project-consistent.
 */
export function verifyIdentifier(
  batch: Batch,
  recordIndex: number,
  policyInput: IdentityPolicyInput,
  expected: string
): { matches: boolean; actual: string } {
  const record = batch.records[recordIndex];
  if (record === undefined) {
    throw new InvalidBatchError([`records.${recordIndex}: no such record`]);
  }

  const policy = parsePolicy(policyInput);
  const plan = createRecordPlanner(batch, policy);
  const actual = primaryId(toIdentifier(plan(record, recordIndex), recordIndex));
  return { matches: actual === expected, actual };
}
