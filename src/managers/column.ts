/**
 * Kanban columns (sections) inside projects
 */

import { extractRecords, generateObjectId } from '../batchWriter';
import { ENDPOINTS } from '../constants';
import { SyncClientError, UnsupportedOperationError } from '../errors';
import { ColumnModel } from '../models';
import type { Column } from '../types';
import { writtenRecord } from './context';
import type { SyncContext } from './context';

export class ColumnManager {
  constructor(private ctx: SyncContext) {}

  /**
   * Columns of every project, optionally only those modified after `since`
   */
  async getAll(since: number = 0): Promise<Column[]> {
    const response = await this.ctx.http.get(ENDPOINTS.COLUMN, { params: { from: since } });
    if (response.empty) return [];
    return extractRecords(response.data, 'columns').map(ColumnModel.fromWire);
  }

  async getByProject(projectId: string): Promise<Column[]> {
    const response = await this.ctx.http.get(`${ENDPOINTS.COLUMN_BY_PROJECT}/${encodeURIComponent(projectId)}`);
    if (response.empty) return [];
    return extractRecords(response.data, 'columns').map(ColumnModel.fromWire);
  }

  async create(projectId: string, name: string, sortOrder: number = 0): Promise<Column> {
    const id = generateObjectId();
    const result = await this.ctx.writer.submit('column', [{ id, projectId, name, sortOrder }]);
    return ColumnModel.fromWire(writtenRecord(result, id));
  }

  async update(column: Column): Promise<Column> {
    const result = await this.ctx.writer.submit('column', [], [ColumnModel.toWire(column)]);
    return ColumnModel.fromWire(writtenRecord(result, column.id));
  }

  async rename(columnId: string, projectId: string, name: string): Promise<Column> {
    const columns = await this.getByProject(projectId);
    const column = columns.find(c => c.id === columnId);
    if (!column) {
      throw new SyncClientError(`Column ${columnId} not found in project ${projectId}`, 'NOT_FOUND');
    }
    return this.update({ ...column, name });
  }

  /**
   * The service has no standalone column delete; deleting the project removes its columns.
   */
  async delete(columnId: string, projectId: string): Promise<never> {
    throw new UnsupportedOperationError(
      `Cannot delete column ${columnId} of project ${projectId}: columns are only removed with their project`
    );
  }
}
