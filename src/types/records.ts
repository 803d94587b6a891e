import type { OpsError } from '../store/errors.js';

export const COLLECTION_IDS = ['maintenance', 'safety', 'flight'] as const;

export type CollectionId = (typeof COLLECTION_IDS)[number];

export type FieldKind = 'string' | 'number' | 'date';

export type FieldValue = string | number;

export type FieldSpec = {
  name: string;
  kind: FieldKind;
  required?: boolean;
};

// Metadata stamped by the store, never supplied by the caller.
export type RecordMeta = {
  id: number;
  created_at: string;
  created_by: string;
  uploaded_via?: string;
};

export type OpsRecord = RecordMeta & { [field: string]: FieldValue | undefined };

export type RecordFields = Record<string, FieldValue>;

export type Role = 'Administrator' | 'Manager' | 'Engineer' | 'Viewer';

// Who is calling. Passed explicitly into every mutating store call.
export type RequestContext = {
  actor: string;
  role: Role;
};

export type CollectionSnapshot = {
  lastId: number;
  records: OpsRecord[];
};

export type QueryFilter =
  | {
      equals?: Record<string, FieldValue>;
      search?: string;
      id?: number;
    }
  | ((record: OpsRecord) => boolean);

export type BulkImportResult =
  | { ok: true; inserted: number; message: string }
  | { ok: false; inserted: 0; message: string; error: OpsError };

export type ImportPreview = {
  totalRows: number;
  totalColumns: number;
  matchedColumns: string[];
  ignoredColumns: string[];
  missingColumns: string[];
  rows: RecordFields[];
};

export type ExportSnapshot = {
  export_date: string;
  exported_by: string;
  statistics: {
    maintenance_records: number;
    safety_records: number;
    flight_records: number;
  };
  maintenance_data: OpsRecord[];
  safety_data: OpsRecord[];
  flight_data: OpsRecord[];
};

export function isCollectionId(value: string): value is CollectionId {
  return COLLECTION_IDS.some((id) => id === value);
}
