import path from 'path';
import { z } from 'zod';
import { isCollectionId, type CollectionId, type CollectionSnapshot, type OpsRecord } from '../src/types/records.js';
import { PersistenceError, errorMessage } from '../src/store/errors.js';
import { FileSystemStorage } from './fileSystemStorage.js';

/**
 * Durable home of the collections. One unit per collection; `save` must either
 * fully succeed or throw.
 */
export interface CollectionStorage {
  load(collection: CollectionId): CollectionSnapshot;
  save(collection: CollectionId, snapshot: CollectionSnapshot): void;
}

const recordSchema = z
  .object({
    id: z.number().int().positive(),
    created_at: z.string(),
    created_by: z.string(),
    uploaded_via: z.string().optional(),
  })
  .catchall(z.union([z.string(), z.number()]));

const envelopeSchema = z.object({
  last_id: z.number().int().nonnegative(),
  records: z.array(recordSchema),
});

// Older files hold a bare array of records.
const fileSchema = z.union([envelopeSchema, z.array(recordSchema)]);

const maxId = (records: OpsRecord[]) => records.reduce((max, r) => Math.max(max, r.id), 0);

export function collectionFile(dataDir: string, collection: CollectionId): string {
  return path.join(dataDir, `${collection}.json`);
}

export function createFileStorage(dataDir: string): CollectionStorage {
  FileSystemStorage.ensureDir(dataDir);

  const save = (collection: CollectionId, snapshot: CollectionSnapshot): void => {
    try {
      FileSystemStorage.writeJsonAtomic(collectionFile(dataDir, collection), {
        last_id: snapshot.lastId,
        records: snapshot.records,
      });
    } catch (error) {
      console.error(`[store] Error writing ${collection}:`, error);
      throw new PersistenceError(`Failed to persist ${collection} data: ${errorMessage(error)}`, error);
    }
  };

  const load = (collection: CollectionId): CollectionSnapshot => {
    const filePath = collectionFile(dataDir, collection);
    let raw: unknown;
    try {
      raw = FileSystemStorage.readJson(filePath);
    } catch (error) {
      throw new PersistenceError(`Failed to read ${collection} data: ${errorMessage(error)}`, error);
    }

    // First run: create the empty unit
    if (raw === null) {
      const empty: CollectionSnapshot = { lastId: 0, records: [] };
      save(collection, empty);
      return empty;
    }

    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new PersistenceError(`Invalid ${collection} data file: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }

    const records: OpsRecord[] = Array.isArray(parsed.data) ? parsed.data : parsed.data.records;
    const declared = Array.isArray(parsed.data) ? 0 : parsed.data.last_id;
    return { lastId: Math.max(declared, maxId(records)), records };
  };

  return { load, save };
}

// Keeps everything in process; used for demos and tests.
export function createMemoryStorage(initial: Partial<Record<CollectionId, CollectionSnapshot>> = {}): CollectionStorage {
  const units = new Map<CollectionId, CollectionSnapshot>();
  for (const [collection, snapshot] of Object.entries(initial)) {
    if (snapshot && isCollectionId(collection)) {
      units.set(collection, { lastId: snapshot.lastId, records: [...snapshot.records] });
    }
  }

  return {
    load(collection) {
      const snapshot = units.get(collection);
      return snapshot ? { lastId: snapshot.lastId, records: [...snapshot.records] } : { lastId: 0, records: [] };
    },
    save(collection, snapshot) {
      units.set(collection, { lastId: snapshot.lastId, records: [...snapshot.records] });
    },
  };
}
