import { DataRecord, FieldType } from '../schemas/record.js';
import { CanonicalizationConfig, NameMode } from '../schemas/policy.js';
import { AmbiguousFieldNameError } from './errors.js';
import { ValueTag, cleanFieldName, resolveValue } from './normalize.js';

/**
 * Canonical record encoding (format R1)
 *
 *   R1 ( D <tag> | U ) <count> { <name> <type-tag + value> }
 *
 * Every <...> is a length-prefixed token `<utf8 byte length>:<utf8 bytes>`,
 * so no two distinct field sets can concatenate to the same bytes. Fields
 * are written in ascending code-unit order of the name being hashed, which
 * makes the encoding independent of column order.
 */
export const CANONICAL_FORMAT = 'R1';

export interface CanonicalField {
  /** Name exactly as the parser produced it */
  rawName: string;
  cleanedName: string;
  /** The name that enters the canonical bytes (cleaned or raw per nameMode) */
  hashedName: string;
  type: FieldType | 'null';
  tag: ValueTag;
  text: string;
}

export interface CanonicalRecord {
  bytes: Buffer;
  fields: CanonicalField[];
  datasetTag?: string;
}

export interface CanonicalizeOptions {
  config: CanonicalizationConfig;
  /** Dataset tag to scope the record to; unscoped when absent */
  datasetTag?: string;
  /** Restrict which fields are encoded, by hashed name */
  selectField?: (hashedName: string) => boolean;
  /** Position of the record in its batch, carried into error context */
  recordIndex?: number;
}

export interface FieldName {
  rawName: string;
  cleanedName: string;
  hashedName: string;
}

export function hashName(name: string, nameMode: NameMode): string {
  return nameMode === 'cleaned' ? cleanFieldName(name) : name;
}

/**
 * Resolve every field name of a record, failing when two fields would hash
 * under the same name
 */
export function resolveFieldNames(
  record: DataRecord,
  nameMode: NameMode,
  recordIndex?: number
): FieldName[] {
  const seen = new Map<string, string>();

  return record.fields.map(field => {
    const cleanedName = cleanFieldName(field.name);
    const hashedName = nameMode === 'cleaned' ? cleanedName : field.name;

    const previous = seen.get(hashedName);
    if (previous !== undefined) {
      throw new AmbiguousFieldNameError(hashedName, [previous, field.name], { recordIndex });
    }
    seen.set(hashedName, field.name);

    return { rawName: field.name, cleanedName, hashedName };
  });
}

function token(text: string): string {
  return `${Buffer.byteLength(text, 'utf8')}:${text}`;
}

function compareNames(a: CanonicalField, b: CanonicalField): number {
  if (a.hashedName < b.hashedName) return -1;
  if (a.hashedName > b.hashedName) return 1;
  return 0;
}

export function canonicalizeRecord(record: DataRecord, options: CanonicalizeOptions): CanonicalRecord {
  const { config, datasetTag, selectField, recordIndex } = options;
  const names = resolveFieldNames(record, config.nameMode, recordIndex);

  const declaredTypes = new Map<string, FieldType>();
  for (const [name, type] of Object.entries(config.fieldTypes)) {
    declaredTypes.set(cleanFieldName(name), type);
  }

  const fields: CanonicalField[] = [];
  record.fields.forEach((field, i) => {
    const name = names[i];
    if (selectField && !selectField(name.hashedName)) return;

    const declared = field.type ?? declaredTypes.get(name.cleanedName);
    const resolved = resolveValue(field, declared, config.numberPrecision, { recordIndex });
    fields.push({ ...name, ...resolved });
  });
  fields.sort(compareNames);

  const parts: string[] = [CANONICAL_FORMAT];
  parts.push(datasetTag === undefined ? 'U' : `D${token(datasetTag)}`);
  parts.push(token(String(fields.length)));
  for (const field of fields) {
    parts.push(token(field.hashedName), token(field.tag + field.text));
  }

  return {
    bytes: Buffer.from(parts.join(''), 'utf8'),
    fields,
    datasetTag,
  };
}
