import type { CollectionId, FieldSpec, FieldValue, RecordFields } from '../types/records.js';
import { ValidationError } from './errors.js';

export const COLLECTION_SCHEMAS: Record<CollectionId, readonly FieldSpec[]> = {
  maintenance: [
    { name: 'maintenance_date', kind: 'date' },
    { name: 'aircraft', kind: 'string', required: true },
    { name: 'type', kind: 'string', required: true },
    { name: 'engineer', kind: 'string' },
    { name: 'priority', kind: 'string' },
    { name: 'status', kind: 'string', required: true },
    { name: 'estimated_hours', kind: 'number' },
    { name: 'parts_replaced', kind: 'string' },
    { name: 'notes', kind: 'string' },
  ],
  safety: [
    { name: 'date', kind: 'date', required: true },
    { name: 'flight', kind: 'string' },
    { name: 'location', kind: 'string' },
    { name: 'type', kind: 'string', required: true },
    { name: 'severity', kind: 'string', required: true },
    { name: 'department', kind: 'string' },
    { name: 'description', kind: 'string' },
    { name: 'reporter', kind: 'string' },
    { name: 'status', kind: 'string' },
  ],
  flight: [
    { name: 'date', kind: 'date', required: true },
    { name: 'aircraft', kind: 'string', required: true },
    { name: 'flight_number', kind: 'string', required: true },
    { name: 'departure', kind: 'string' },
    { name: 'arrival', kind: 'string' },
    { name: 'pilot', kind: 'string' },
    { name: 'crew_count', kind: 'number' },
    { name: 'passengers', kind: 'number' },
    { name: 'notes', kind: 'string' },
  ],
};

export const META_COLUMNS = ['created_at', 'created_by', 'uploaded_via'] as const;

export function fieldNames(collection: CollectionId): string[] {
  return COLLECTION_SCHEMAS[collection].map(f => f.name);
}

// Header used for CSV export: id first, then the schema, then the stamps.
export function exportColumns(collection: CollectionId): string[] {
  return ['id', ...fieldNames(collection), ...META_COLUMNS];
}

const toNumber = (raw: string): number | null => {
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
};

/**
 * Maps an imported row onto the collection schema. Unknown columns are dropped,
 * missing ones become '', numeric columns are converted when they parse.
 */
export function rowToFields(collection: CollectionId, row: Record<string, string>): RecordFields {
  const fields: RecordFields = {};
  for (const field of COLLECTION_SCHEMAS[collection]) {
    const raw = row[field.name] ?? '';
    if (field.kind === 'number') {
      const n = toNumber(raw);
      fields[field.name] = n === null ? raw : n;
    } else {
      fields[field.name] = raw;
    }
  }
  return fields;
}

/**
 * Validates fields for a single insert: required fields must be present and
 * numeric fields must hold numbers.
 */
export function validateFields(collection: CollectionId, input: Record<string, unknown>): RecordFields {
  const fields: RecordFields = {};
  const missing: string[] = [];

  for (const field of COLLECTION_SCHEMAS[collection]) {
    const value = input[field.name];
    const normalized: FieldValue = normalizeValue(field.name, field.kind, value);
    if (field.required && normalized === '') missing.push(field.name);
    fields[field.name] = normalized;
  }

  if (missing.length > 0) {
    throw new ValidationError(`Missing required field(s): ${missing.join(', ')}`);
  }
  return fields;
}

function normalizeValue(name: string, kind: FieldSpec['kind'], value: unknown): FieldValue {
  if (value === undefined || value === null) return '';
  if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
    throw new ValidationError(`${name} must be a text or number value`);
  }
  if (kind === 'number') {
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) throw new ValidationError(`${name} must be a number`);
      return value;
    }
    const n = toNumber(String(value));
    if (n === null) {
      if (String(value).trim() === '') return '';
      throw new ValidationError(`${name} must be a number`);
    }
    return n;
  }
  return typeof value === 'string' ? value.trim() : String(value);
}
