import { Router, type Request } from 'express';
import multer from 'multer';
import { contextOf } from '../../src/auth/sessions.js';
import { ParseError, ValidationError } from '../../src/store/errors.js';
import { fieldNames } from '../../src/store/schemas.js';
import { templateCsv } from '../../src/store/templates.js';
import type { FieldValue, QueryFilter } from '../../src/types/records.js';
import { fileStamp, parseCollection, queryString, sendError } from '../http.js';
import { requireRole, requireSession, verifyAuth } from '../middleware/auth.js';
import type { AppServices } from '../services.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeUpload(buffer: Buffer): string {
  try {
    return utf8.decode(buffer);
  } catch {
    throw new ParseError('File is not valid UTF-8');
  }
}

// The uploaded file wins; a JSON body { csv: "..." } is accepted as well.
function csvPayload(req: Request): string {
  if (req.file) return decodeUpload(req.file.buffer);
  const body: unknown = req.body;
  if (body && typeof body === 'object' && 'csv' in body && typeof body.csv === 'string') {
    return body.csv;
  }
  throw new ValidationError('No file uploaded');
}

function buildFilter(req: Request, fields: string[]): QueryFilter {
  const equals: Record<string, FieldValue> = {};
  for (const field of fields) {
    const value = queryString(req.query[field]);
    if (value !== undefined) equals[field] = value;
  }

  let id: number | undefined;
  const rawId = queryString(req.query.id);
  if (rawId !== undefined) {
    if (!/^\d+$/.test(rawId.trim())) throw new ValidationError('id must be a whole number');
    id = Number(rawId);
  }

  return { equals, search: queryString(req.query.search), id };
}

export function recordRoutes({ config, store, sessions }: AppServices): Router {
  const router = Router();
  const auth = verifyAuth(sessions);
  const upload = multer({ storage: multer.memoryStorage(), limits: { fileSize: config.uploadLimitBytes } });

  router.get('/records/:collection', auth, (req, res) => {
    try {
      const collection = parseCollection(req.params.collection);
      const records = store.query(collection, buildFilter(req, fieldNames(collection)));
      res.json({ records, total: store.count(collection) });
    } catch (error) {
      sendError(res, error, 'fetch records');
    }
  });

  router.post('/records/:collection', auth, requireRole(config.writeRoles, 'add records'), (req, res) => {
    try {
      const collection = parseCollection(req.params.collection);
      const body: unknown = req.body;
      if (!body || typeof body !== 'object' || Array.isArray(body)) {
        throw new ValidationError('Request body must be an object of fields');
      }
      const record = store.insert(collection, { ...body }, contextOf(requireSession(req)));
      res.status(201).json({ record });
    } catch (error) {
      sendError(res, error, 'create record');
    }
  });

  router.post('/records/:collection/import/preview', auth, upload.single('file'), (req, res) => {
    try {
      const collection = parseCollection(req.params.collection);
      res.json({ preview: store.previewImport(collection, csvPayload(req)) });
    } catch (error) {
      sendError(res, error, 'preview import');
    }
  });

  router.post('/records/:collection/import', auth, upload.single('file'), (req, res) => {
    try {
      const collection = parseCollection(req.params.collection);
      const session = requireSession(req);
      let csvText: string;
      try {
        csvText = csvPayload(req);
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        return res.status(error.status).json({ error: error.message, inserted: 0 });
      }
      const result = store.bulkImport(collection, csvText, contextOf(session));
      if (!result.ok) {
        return res.status(result.error.status).json({ error: result.message, inserted: 0 });
      }
      res.json({ inserted: result.inserted, message: result.message });
    } catch (error) {
      sendError(res, error, 'import records');
    }
  });

  router.delete('/records/:collection', auth, (req, res) => {
    try {
      const collection = parseCollection(req.params.collection);
      const from = queryString(req.query.from) ?? '';
      const to = queryString(req.query.to) ?? '';
      const deleted = store.deleteRange(collection, from, to, contextOf(requireSession(req)));
      res.json({ deleted });
    } catch (error) {
      sendError(res, error, 'delete records');
    }
  });

  router.get('/records/:collection/export', auth, (req, res) => {
    try {
      const collection = parseCollection(req.params.collection);
      res
        .type('text/csv')
        .attachment(`${collection}_export_${fileStamp(new Date())}.csv`)
        .send(store.exportCsv(collection));
    } catch (error) {
      sendError(res, error, 'export records');
    }
  });

  router.get('/records/:collection/template', auth, (req, res) => {
    try {
      const collection = parseCollection(req.params.collection);
      res.type('text/csv').attachment(`${collection}_template.csv`).send(templateCsv(collection));
    } catch (error) {
      sendError(res, error, 'build template');
    }
  });

  router.get('/export', auth, (req, res) => {
    try {
      const snapshot = store.exportSnapshot(contextOf(requireSession(req)));
      res.attachment(`ops_complete_export_${fileStamp(new Date())}.json`).json(snapshot);
    } catch (error) {
      sendError(res, error, 'export data');
    }
  });

  return router;
}
