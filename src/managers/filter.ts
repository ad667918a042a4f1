/**
 * Saved filters (smart lists)
 */

import { generateObjectId } from '../batchWriter';
import { FilterModel } from '../models';
import { collectionItems } from '../reconciliation';
import type { Filter } from '../types';
import { writtenRecord } from './context';
import type { SyncContext } from './context';

export interface FilterCondition {
  conditionType: number;
  conditionName: string;
  or: Array<string | { or: string[]; conditionName: string }>;
}

export interface FilterRule {
  type: number;
  and: FilterCondition[];
  version: number;
}

export interface FilterRuleOptions {
  projectIds?: string[];
  tagNames?: string[];
  /** Priority levels: 0, 1, 3, 5 */
  priority?: number[];
  status?: 'completed' | 'uncompleted';
  taskType?: 'task' | 'note';
}

export interface CreateFilterOptions {
  sortType?: string;
  viewMode?: 'list' | 'kanban' | 'timeline';
  sortOrder?: number;
}

export class FilterManager {
  constructor(private ctx: SyncContext) {}

  async getAll(): Promise<Filter[]> {
    const resolved = await this.ctx.engine.resolve('filters', true);
    return collectionItems(resolved).map(FilterModel.fromWire);
  }

  async get(filterId: string): Promise<Filter | undefined> {
    const filters = await this.getAll();
    return filters.find(filter => filter.id === filterId);
  }

  async create(name: string, rule: FilterRule | string, options: CreateFilterOptions = {}): Promise<Filter> {
    const id = generateObjectId();
    const result = await this.ctx.writer.submit('filter', [
      {
        id,
        name,
        rule: typeof rule === 'string' ? rule : JSON.stringify(rule),
        sortType: options.sortType ?? 'sortOrder',
        sortOrder: options.sortOrder ?? 0,
        viewMode: options.viewMode ?? 'list',
      },
    ]);
    return FilterModel.fromWire(writtenRecord(result, id));
  }

  async update(filter: Filter): Promise<Filter> {
    const result = await this.ctx.writer.submit('filter', [], [FilterModel.toWire(filter)]);
    return FilterModel.fromWire(writtenRecord(result, filter.id));
  }

  async delete(filterId: string): Promise<void> {
    await this.ctx.writer.submit('filter', [], [], [filterId]);
  }

  /**
   * Build a rule for create(). Every rule ends with a task type condition.
   */
  static buildRule(options: FilterRuleOptions = {}): FilterRule {
    const and: FilterCondition[] = [];

    if (options.projectIds && options.projectIds.length > 0) {
      and.push({
        conditionType: 1,
        or: [{ or: options.projectIds, conditionName: 'list' }],
        conditionName: 'listOrGroup',
      });
    }
    if (options.tagNames && options.tagNames.length > 0) {
      and.push({ conditionType: 1, or: options.tagNames, conditionName: 'tag' });
    }
    if (options.priority !== undefined) {
      and.push({ conditionType: 1, or: options.priority.map(String), conditionName: 'priority' });
    }
    if (options.status) {
      and.push({ conditionType: 1, or: [options.status], conditionName: 'status' });
    }
    and.push({ conditionType: 1, or: [options.taskType ?? 'task'], conditionName: 'taskType' });

    return { type: 0, and, version: 3 };
  }
}
