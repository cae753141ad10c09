import { describe, it, expect } from 'vitest';
import { parsePolicy, IdentityPolicySchema } from '../../src/schemas/policy.js';
import { PolicyError } from '../../src/utils/errors.js';

describe('parsePolicy', () => {
  it('fills content-hash defaults', () => {
    expect(parsePolicy({ mode: 'content-hash' })).toEqual({
      mode: 'content-hash',
      fieldSubset: 'all',
      datasetScoped: true,
      hashAlgorithmVersion: 'sha256-v1',
      canonicalization: { nameMode: 'cleaned', numberPrecision: 15, fieldTypes: {} },
    });
  });

  it('fills sequential defaults', () => {
    expect(parsePolicy({ mode: 'sequential' })).toEqual({
      mode: 'sequential',
      start: 1,
      prefix: '',
      datasetScoped: false,
    });
  });

  it('fills composite defaults', () => {
    const policy = parsePolicy({ mode: 'composite', shortFields: ['name'] });
    expect(policy).toEqual({
      mode: 'composite',
      shortFields: ['name'],
      shortDatasetScoped: false,
      hashAlgorithmVersion: 'sha256-v1',
      canonicalization: { nameMode: 'cleaned', numberPrecision: 15, fieldTypes: {} },
    });
  });

  it('keeps explicit options', () => {
    const policy = parsePolicy({
      mode: 'content-hash',
      fieldSubset: { exclude: ['imported_at'] },
      datasetScoped: false,
      hashAlgorithmVersion: 'sha3-256-v1',
      canonicalization: { nameMode: 'raw', fieldTypes: { dob: 'date' } },
    });
    expect(policy).toEqual({
      mode: 'content-hash',
      fieldSubset: { exclude: ['imported_at'] },
      datasetScoped: false,
      hashAlgorithmVersion: 'sha3-256-v1',
      canonicalization: { nameMode: 'raw', numberPrecision: 15, fieldTypes: { dob: 'date' } },
    });
  });

  it('is idempotent on parsed policies', () => {
    const policy = parsePolicy({ mode: 'composite', shortFields: ['a', 'b'] });
    expect(parsePolicy(policy)).toEqual(policy);
  });

  it('rejects unknown modes', () => {
    expect(() => parsePolicy({ mode: 'random' })).toThrow(PolicyError);
  });

  it('rejects unknown hash versions', () => {
    expect(() => parsePolicy({ mode: 'content-hash', hashAlgorithmVersion: 'md5' })).toThrow(PolicyError);
  });

  it('requires at least one short field', () => {
    try {
      parsePolicy({ mode: 'composite', shortFields: [] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PolicyError);
      if (err instanceof PolicyError) {
        expect(err.code).toBe('INVALID_POLICY');
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]?.startsWith('shortFields: ')).toBe(true);
      }
    }
  });

  it('rejects an empty include list and mixed subsets', () => {
    expect(() => parsePolicy({ mode: 'content-hash', fieldSubset: { include: [] } })).toThrow(PolicyError);
    expect(() =>
      parsePolicy({ mode: 'content-hash', fieldSubset: { include: ['a'], exclude: ['b'] } })
    ).toThrow(PolicyError);
  });

  it('bounds number precision', () => {
    expect(() => parsePolicy({ mode: 'content-hash', canonicalization: { numberPrecision: 0 } })).toThrow(
      PolicyError
    );
    expect(() => parsePolicy({ mode: 'content-hash', canonicalization: { numberPrecision: 18 } })).toThrow(
      PolicyError
    );
  });

  it('rejects unknown and misspelled options', () => {
    try {
      parsePolicy({ mode: 'content-hash', datasetscoped: false });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PolicyError);
      if (err instanceof PolicyError) {
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toContain('datasetscoped');
      }
    }
    expect(() => parsePolicy({ mode: 'composite', shortFields: ['name'], datasetScoped: false })).toThrow(
      PolicyError
    );
    expect(() => parsePolicy({ mode: 'composite', shortFields: ['name'], fieldSubset: 'all' })).toThrow(PolicyError);
    expect(() => parsePolicy({ mode: 'sequential', prefx: 'P-' })).toThrow(PolicyError);
    expect(() => parsePolicy({ mode: 'content-hash', canonicalization: { namemode: 'raw' } })).toThrow(PolicyError);
  });

  it('rejects negative sequence starts', () => {
    expect(() => parsePolicy({ mode: 'sequential', start: -1 })).toThrow(PolicyError);
  });
});

describe('IdentityPolicySchema', () => {
  it('discriminates on mode', () => {
    expect(IdentityPolicySchema.safeParse({ mode: 'sequential', start: 10 }).success).toBe(true);
    expect(IdentityPolicySchema.safeParse({ start: 10 }).success).toBe(false);
  });
});
