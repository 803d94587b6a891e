import type { CollectionStorage } from '../../utils/fileStorage.js';
import { parseCSV, toCSV } from '../../utils/csv.js';
import { hasRole, isAdministrator } from '../auth/roles.js';
import {
  COLLECTION_IDS,
  type BulkImportResult,
  type CollectionId,
  type CollectionSnapshot,
  type ExportSnapshot,
  type ImportPreview,
  type OpsRecord,
  type QueryFilter,
  type RecordFields,
  type RequestContext,
  type Role,
} from '../types/records.js';
import { sameValue } from './aggregator.js';
import { AuthorizationError, OpsError, ParseError, ValidationError, errorMessage } from './errors.js';
import { exportColumns, fieldNames, rowToFields, validateFields } from './schemas.js';

export const BULK_IMPORT_MARKER = 'bulk import';

const PREVIEW_ROWS = 10;

export type ImportPolicy = {
  allowedRoles: readonly Role[];
};

export const DEFAULT_IMPORT_POLICY: ImportPolicy = { allowedRoles: ['Administrator'] };

export type RecordStoreOptions = {
  storage: CollectionStorage;
  importPolicy?: ImportPolicy;
  now?: () => Date;
};

const parseBound = (name: string, value: number | string): number => {
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) throw new ValidationError(`${name} must be a whole number`);
    return value;
  }
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) throw new ValidationError(`${name} must be a whole number`);
  return Number(trimmed);
};

const matches = (record: OpsRecord, filter: QueryFilter): boolean => {
  if (typeof filter === 'function') return filter(record);

  if (filter.id !== undefined && record.id !== filter.id) return false;

  if (filter.equals) {
    for (const [field, value] of Object.entries(filter.equals)) {
      if (!sameValue(record[field], value)) return false;
    }
  }

  if (filter.search) {
    const needle = filter.search.toLowerCase();
    const hit = Object.values(record).some(v => v !== undefined && String(v).toLowerCase().includes(needle));
    if (!hit) return false;
  }

  return true;
};

/**
 * Owns the maintenance, safety and flight collections.
 *
 * Every mutation builds the next state, writes it through the storage and only
 * then swaps it in, so a failed write leaves memory as it was. Mutations never
 * await between reading `lastId` and the swap; the event loop is the lock.
 */
export class RecordStore {
  private readonly storage: CollectionStorage;
  private readonly importPolicy: ImportPolicy;
  private readonly now: () => Date;
  private readonly collections = new Map<CollectionId, CollectionSnapshot>();

  constructor(options: RecordStoreOptions) {
    this.storage = options.storage;
    this.importPolicy = options.importPolicy ?? DEFAULT_IMPORT_POLICY;
    this.now = options.now ?? (() => new Date());

    for (const id of COLLECTION_IDS) {
      const loaded = this.storage.load(id);
      this.collections.set(id, { lastId: loaded.lastId, records: loaded.records.map(r => Object.freeze({ ...r })) });
    }
  }

  snapshot(collection: CollectionId): readonly OpsRecord[] {
    return this.state(collection).records;
  }

  count(collection: CollectionId): number {
    return this.state(collection).records.length;
  }

  insert(collection: CollectionId, input: Record<string, unknown>, ctx: RequestContext): OpsRecord {
    const fields = validateFields(collection, input);
    const current = this.state(collection);
    const record = this.stamp(fields, current.lastId + 1, ctx);

    this.commit(collection, { lastId: record.id, records: [...current.records, record] });
    console.log(`[store] ${ctx.actor} added ${collection} record #${record.id}`);
    return record;
  }

  bulkImport(collection: CollectionId, csvText: string, ctx: RequestContext): BulkImportResult {
    try {
      if (!hasRole(ctx.role, this.importPolicy.allowedRoles)) {
        throw new AuthorizationError(
          `Access denied: bulk import requires one of ${this.importPolicy.allowedRoles.join(', ')}`,
        );
      }

      const table = parseCSV(csvText);
      const rows = table.rows.map(row => rowToFields(collection, row));

      const current = this.state(collection);
      let nextId = current.lastId;
      const created = rows.map(fields => this.stamp(fields, ++nextId, ctx, BULK_IMPORT_MARKER));

      this.commit(collection, { lastId: nextId, records: [...current.records, ...created] });
      console.log(`[store] ${ctx.actor} imported ${created.length} ${collection} record(s)`);
      return { ok: true, inserted: created.length, message: 'Success' };
    } catch (error) {
      const failure = error instanceof OpsError ? error : new ParseError(errorMessage(error));
      console.error(`[store] Bulk import into ${collection} failed:`, failure.message);
      return { ok: false, inserted: 0, message: failure.message, error: failure };
    }
  }

  previewImport(collection: CollectionId, csvText: string): ImportPreview {
    const table = parseCSV(csvText);
    const schema = fieldNames(collection);
    return {
      totalRows: table.rows.length,
      totalColumns: table.headers.length,
      matchedColumns: table.headers.filter(h => schema.includes(h)),
      ignoredColumns: table.headers.filter(h => !schema.includes(h)),
      missingColumns: schema.filter(f => !table.headers.includes(f)),
      rows: table.rows.slice(0, PREVIEW_ROWS).map(row => rowToFields(collection, row)),
    };
  }

  query(collection: CollectionId, filter?: QueryFilter): OpsRecord[] {
    const records = this.state(collection).records;
    return filter ? records.filter(r => matches(r, filter)) : [...records];
  }

  deleteRange(collection: CollectionId, low: number | string, high: number | string, ctx: RequestContext): number {
    if (!isAdministrator(ctx.role)) {
      throw new AuthorizationError('Access denied: only administrators can delete records');
    }

    const from = parseBound('Start id', low);
    const to = parseBound('End id', high);
    if (from > to) {
      throw new ValidationError(`Invalid range: start id ${from} is greater than end id ${to}`);
    }

    const current = this.state(collection);
    const kept = current.records.filter(r => r.id < from || r.id > to);
    const removed = current.records.length - kept.length;
    if (removed === 0) return 0;

    this.commit(collection, { lastId: current.lastId, records: kept });
    console.log(`[store] ${ctx.actor} deleted ${removed} ${collection} record(s) in #${from}-#${to}`);
    return removed;
  }

  exportCsv(collection: CollectionId): string {
    return toCSV(exportColumns(collection), this.state(collection).records);
  }

  exportSnapshot(ctx: RequestContext): ExportSnapshot {
    const maintenance = this.query('maintenance');
    const safety = this.query('safety');
    const flight = this.query('flight');
    return {
      export_date: this.now().toISOString(),
      exported_by: ctx.actor,
      statistics: {
        maintenance_records: maintenance.length,
        safety_records: safety.length,
        flight_records: flight.length,
      },
      maintenance_data: maintenance,
      safety_data: safety,
      flight_data: flight,
    };
  }

  private stamp(fields: RecordFields, id: number, ctx: RequestContext, uploadedVia?: string): OpsRecord {
    const record: OpsRecord = {
      ...fields,
      id,
      created_at: this.now().toISOString(),
      created_by: ctx.actor,
    };
    if (uploadedVia) record.uploaded_via = uploadedVia;
    return Object.freeze(record);
  }

  private state(collection: CollectionId): CollectionSnapshot {
    const snapshot = this.collections.get(collection);
    if (!snapshot) throw new ValidationError(`Unknown collection "${collection}"`);
    return snapshot;
  }

  // Persist first; memory only changes once the write went through
  private commit(collection: CollectionId, next: CollectionSnapshot): void {
    this.storage.save(collection, next);
    this.collections.set(collection, next);
  }
}
