import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { createFileStorage, createMemoryStorage, type CollectionStorage } from '../../utils/fileStorage.js';
import type { RequestContext } from '../types/records.js';
import { countWhere } from './aggregator.js';
import { PersistenceError } from './errors.js';
import { BULK_IMPORT_MARKER, RecordStore } from './recordStore.js';

const FIXED_NOW = new Date('2025-03-01T08:30:00.000Z');

const admin: RequestContext = { actor: 'admin', role: 'Administrator' };
const engineer: RequestContext = { actor: 'engineer1', role: 'Engineer' };
const manager: RequestContext = { actor: 'manager1', role: 'Manager' };

const tempDir = () => fs.mkdtempSync(path.join(os.tmpdir(), 'ops-store-'));

const newStore = (storage: CollectionStorage = createMemoryStorage()) =>
  new RecordStore({ storage, now: () => FIXED_NOW });

const checkFields = (aircraft: string) => ({
  aircraft,
  type: 'A-Check',
  estimated_hours: 8.0,
  status: 'Pending',
});

const SAFETY_CSV = [
  'date,flight,type,severity,extra',
  '2025-01-10,PK-300,Bird Strike,Low,x',
  '2025-01-11,PK-301,Technical Failure,High,y',
  '2025-01-12,PK-302,Turbulence,Medium,z',
].join('\n');

test('an engineer adds a pending check and it shows up in the pending query', () => {
  const store = newStore();
  const record = store.insert('maintenance', checkFields('AP-BOC'), engineer);

  assert.equal(record.id, 1);
  assert.equal(record.created_by, 'engineer1');
  assert.equal(record.created_at, '2025-03-01T08:30:00.000Z');
  assert.equal(record.estimated_hours, 8);
  assert.equal(record.notes, '');
  assert.equal(record.uploaded_via, undefined);

  const pending = store.query('maintenance', { equals: { status: 'Pending' } });
  assert.deepEqual(pending.map(r => r.id), [1]);
});

test('insert rejects missing required fields and non-numeric numbers', () => {
  const store = newStore();

  assert.throws(
    () => store.insert('maintenance', { aircraft: 'AP-BOC', type: 'A-Check' }, engineer),
    { name: 'ValidationError', message: 'Missing required field(s): status' },
  );
  assert.throws(
    () => store.insert('maintenance', { ...checkFields('AP-BOC'), estimated_hours: 'abc' }, engineer),
    { name: 'ValidationError', message: 'estimated_hours must be a number' },
  );
  assert.equal(store.count('maintenance'), 0);

  const record = store.insert('maintenance', { ...checkFields('AP-BOC'), estimated_hours: '12', color: 'red' }, engineer);
  assert.equal(record.estimated_hours, 12);
  assert.equal('color' in record, false);
});

test('insert rejects object and array values', () => {
  const store = newStore();

  assert.throws(() => store.insert('maintenance', { ...checkFields('AP-BOC'), aircraft: {} }, engineer), {
    name: 'ValidationError',
    message: 'aircraft must be a text or number value',
  });
  assert.throws(() => store.insert('maintenance', { ...checkFields('AP-BOC'), estimated_hours: [8] }, engineer), {
    name: 'ValidationError',
    message: 'estimated_hours must be a text or number value',
  });
  assert.equal(store.count('maintenance'), 0);
});

test('query equality and countWhere agree on numeric fields', () => {
  const store = newStore();
  store.bulkImport('flight', 'date,aircraft,flight_number,crew_count\n2025-02-01,AP-BOC,PK-300,4\n2025-02-02,AP-BOD,PK-301,5', admin);

  assert.deepEqual(store.query('flight', { equals: { crew_count: '4' } }).map(r => r.flight_number), ['PK-300']);
  assert.equal(countWhere(store.snapshot('flight'), 'crew_count', '4'), 1);
});

test('ids stay unique across inserts and imports', () => {
  const store = newStore();
  store.insert('maintenance', checkFields('AP-BOC'), admin);
  store.bulkImport('maintenance', 'aircraft,type,status\nAP-BOD,B-Check,Pending\nAP-BOE,C-Check,Completed', admin);
  store.insert('maintenance', checkFields('AP-BOF'), admin);

  assert.deepEqual(store.query('maintenance').map(r => r.id), [1, 2, 3, 4]);
});

test('ids are not reused after the highest records are deleted', () => {
  const store = newStore();
  for (const aircraft of ['AP-BOC', 'AP-BOD', 'AP-BOE']) store.insert('maintenance', checkFields(aircraft), admin);

  assert.equal(store.deleteRange('maintenance', 2, 3, admin), 2);
  assert.equal(store.insert('maintenance', checkFields('AP-BOF'), admin).id, 4);
});

test('bulk import of three safety rows persists them all', () => {
  const dir = tempDir();
  const store = newStore(createFileStorage(dir));
  assert.equal(store.count('safety'), 0);

  const result = store.bulkImport('safety', SAFETY_CSV, admin);

  assert.deepEqual(result, { ok: true, inserted: 3, message: 'Success' });
  const records = store.query('safety');
  assert.equal(records.length, 3);
  assert.ok(records.every(r => r.uploaded_via === BULK_IMPORT_MARKER && r.created_by === 'admin'));
  assert.equal('extra' in records[0], false);
  assert.equal(records[0].reporter, '');
  assert.equal(records[1].severity, 'High');
  assert.equal(createFileStorage(dir).load('safety').records.length, 3);
});

test('imported numeric columns are converted when they parse', () => {
  const store = newStore();
  store.bulkImport('flight', 'date,aircraft,flight_number,crew_count,passengers\n2025-02-01,AP-BOC,PK-300,4,n/a', admin);

  const [flight] = store.query('flight');
  assert.equal(flight.crew_count, 4);
  assert.equal(flight.passengers, 'n/a');
});

test('a header-only file imports nothing', () => {
  const store = newStore();
  assert.deepEqual(store.bulkImport('flight', 'date,aircraft,flight_number\n', admin), {
    ok: true,
    inserted: 0,
    message: 'Success',
  });
});

test('a malformed import leaves the collection untouched', () => {
  const store = newStore();
  store.insert('flight', { date: '2025-02-01', aircraft: 'AP-BOC', flight_number: 'PK-300' }, admin);

  const result = store.bulkImport('flight', '{"not": "csv"}', admin);

  assert.equal(result.ok, false);
  assert.equal(result.inserted, 0);
  if (!result.ok) assert.equal(result.error.name, 'ParseError');
  assert.equal(store.count('flight'), 1);
});

test('bulk import follows the configured import policy', () => {
  const strict = newStore();
  const refused = strict.bulkImport('safety', SAFETY_CSV, manager);
  assert.equal(refused.ok, false);
  if (!refused.ok) {
    assert.equal(refused.error.status, 403);
    assert.equal(refused.message, 'Access denied: bulk import requires one of Administrator');
  }
  assert.equal(strict.count('safety'), 0);

  const relaxed = new RecordStore({
    storage: createMemoryStorage(),
    importPolicy: { allowedRoles: ['Administrator', 'Manager'] },
  });
  assert.equal(relaxed.bulkImport('safety', SAFETY_CSV, manager).inserted, 3);
});

test('query supports case-insensitive search, id lookup and predicates', () => {
  const store = newStore();
  store.insert('maintenance', checkFields('AP-BOC'), admin);
  store.insert('maintenance', { ...checkFields('AP-BOD'), status: 'Completed' }, admin);

  assert.deepEqual(store.query('maintenance', { search: 'boc' }).map(r => r.aircraft), ['AP-BOC']);
  assert.deepEqual(store.query('maintenance', { id: 2 }).map(r => r.aircraft), ['AP-BOD']);
  assert.deepEqual(store.query('maintenance', r => r.status === 'Completed').map(r => r.id), [2]);
  assert.deepEqual(store.query('maintenance', { equals: { status: 'Cancelled' } }), []);
});

test('range delete removes exactly the ids in range', () => {
  const store = newStore();
  for (let i = 0; i < 5; i++) store.insert('maintenance', checkFields(`AP-BO${i}`), admin);
  const [first, , , , last] = store.query('maintenance');

  assert.equal(store.deleteRange('maintenance', 2, 4, admin), 3);
  assert.deepEqual(store.query('maintenance'), [first, last]);
});

test('range delete rejects bad ranges and non-administrators', () => {
  const store = newStore();
  for (let i = 0; i < 5; i++) store.insert('maintenance', checkFields(`AP-BO${i}`), admin);

  assert.throws(() => store.deleteRange('maintenance', 5, 3, admin), {
    name: 'ValidationError',
    message: 'Invalid range: start id 5 is greater than end id 3',
  });
  assert.throws(() => store.deleteRange('maintenance', 'abc', 3, admin), {
    name: 'ValidationError',
    message: 'Start id must be a whole number',
  });
  assert.throws(() => store.deleteRange('maintenance', 1, 5, manager), { name: 'AuthorizationError' });
  assert.equal(store.count('maintenance'), 5);
  assert.equal(store.deleteRange('maintenance', '40', '50', admin), 0);
});

test('a failed write leaves memory unchanged', () => {
  const inner = createMemoryStorage();
  let failing = false;
  const storage: CollectionStorage = {
    load: collection => inner.load(collection),
    save: (collection, snapshot) => {
      if (failing) throw new PersistenceError(`Failed to persist ${collection} data: disk full`);
      inner.save(collection, snapshot);
    },
  };
  const store = newStore(storage);

  failing = true;
  assert.throws(() => store.insert('maintenance', checkFields('AP-BOC'), admin), { name: 'PersistenceError' });
  const result = store.bulkImport('safety', SAFETY_CSV, admin);
  assert.equal(result.ok, false);
  if (!result.ok) assert.equal(result.error.status, 500);
  assert.equal(store.count('maintenance'), 0);
  assert.equal(store.count('safety'), 0);

  failing = false;
  assert.equal(store.insert('maintenance', checkFields('AP-BOC'), admin).id, 1);
});

test('state survives a reload from disk', () => {
  const dir = tempDir();
  const store = newStore(createFileStorage(dir));
  store.insert('maintenance', checkFields('AP-BOC'), engineer);
  store.insert('maintenance', checkFields('AP-BOD'), engineer);
  store.bulkImport('safety', SAFETY_CSV, admin);
  store.deleteRange('safety', 2, 2, admin);

  const reopened = newStore(createFileStorage(dir));
  assert.deepEqual(reopened.query('maintenance'), store.query('maintenance'));
  assert.deepEqual(reopened.query('safety'), store.query('safety'));
  assert.equal(reopened.insert('safety', { date: '2025-01-13', type: 'Other', severity: 'Low' }, admin).id, 4);
});

test('exportCsv writes id, the schema fields and the stamps', () => {
  const store = newStore();
  store.insert('maintenance', checkFields('AP-BOC'), engineer);

  assert.equal(
    store.exportCsv('maintenance'),
    [
      'id,maintenance_date,aircraft,type,engineer,priority,status,estimated_hours,parts_replaced,notes,created_at,created_by,uploaded_via',
      '1,,AP-BOC,A-Check,,,Pending,8,,,2025-03-01T08:30:00.000Z,engineer1,',
    ].join('\n'),
  );
});

test('exportSnapshot bundles every collection with counts', () => {
  const store = newStore();
  store.insert('maintenance', checkFields('AP-BOC'), admin);
  store.bulkImport('safety', SAFETY_CSV, admin);

  const snapshot = store.exportSnapshot(manager);
  assert.equal(snapshot.export_date, '2025-03-01T08:30:00.000Z');
  assert.equal(snapshot.exported_by, 'manager1');
  assert.deepEqual(snapshot.statistics, { maintenance_records: 1, safety_records: 3, flight_records: 0 });
  assert.equal(snapshot.safety_data.length, 3);
});

test('previewImport reports column coverage without storing anything', () => {
  const store = newStore();
  const preview = store.previewImport('maintenance', 'aircraft,type,bogus\nAP-BOC,A-Check,1');

  assert.equal(preview.totalRows, 1);
  assert.equal(preview.totalColumns, 3);
  assert.deepEqual(preview.matchedColumns, ['aircraft', 'type']);
  assert.deepEqual(preview.ignoredColumns, ['bogus']);
  assert.deepEqual(preview.missingColumns, [
    'maintenance_date',
    'engineer',
    'priority',
    'status',
    'estimated_hours',
    'parts_replaced',
    'notes',
  ]);
  assert.equal(preview.rows[0].aircraft, 'AP-BOC');
  assert.equal(store.count('maintenance'), 0);
});
