import type { Response } from 'express';
import { OpsError, ValidationError, errorMessage } from '../src/store/errors.js';
import { isCollectionId, type CollectionId } from '../src/types/records.js';

export function sendError(res: Response, error: unknown, label?: string): void {
  if (error instanceof OpsError) {
    if (error.status >= 500) console.error(`Error in ${label ?? 'request'}:`, error);
    res.status(error.status).json({ error: error.message });
    return;
  }
  console.error(`Error in ${label ?? 'request'}:`, error);
  res.status(500).json({ error: label ? `Failed to ${label}` : errorMessage(error) });
}

export function parseCollection(value: string): CollectionId {
  if (!isCollectionId(value)) throw new ValidationError(`Unknown collection "${value}"`);
  return value;
}

// Only plain ?key=value strings are honoured
export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export const fileStamp = (date: Date) =>
  date.toISOString().slice(0, 16).replace(/[-:]/g, '').replace('T', '_');
