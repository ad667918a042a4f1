/**
 * Collaborators shared by the resource managers
 */

import type { BatchWriteCoordinator } from '../batchWriter';
import { ProtocolError } from '../errors';
import type { ApiClient } from '../http';
import type { ReconciliationEngine } from '../reconciliation';
import type { BatchWriteResult, WireRecord } from '../types';

export interface SyncContext {
  http: ApiClient;
  engine: ReconciliationEngine;
  writer: BatchWriteCoordinator;
}

export function isWireRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow a JSON response body to a single record
 */
export function asRecord(data: unknown, what: string): WireRecord {
  if (!isWireRecord(data)) {
    throw new ProtocolError(`Expected ${what} to be a JSON object`);
  }
  return data;
}

/**
 * The materialised record of a single-record write. A write the server
 * refused per-record (id2error) has none.
 */
export function writtenRecord(result: BatchWriteResult, key: string): WireRecord {
  const record = result.records[0];
  if (!record) {
    const reason = key in result.errors ? JSON.stringify(result.errors[key]) : 'no record returned';
    throw new ProtocolError(`${result.entityType} "${key}" was not written: ${reason}`);
  }
  return record;
}
