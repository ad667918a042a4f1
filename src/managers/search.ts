/**
 * Server-side keyword search and client-side task filtering
 */

import { extractRecords } from '../batchWriter';
import { ENDPOINTS } from '../constants';
import { TaskModel } from '../models';
import type { Task, WireRecord } from '../types';
import { asRecord } from './context';
import type { SyncContext } from './context';
import type { TaskManager } from './task';

export interface TaskCriteria {
  projectId?: string;
  tag?: string;
  priority?: number;
  status?: number;
  hasDueDate?: boolean;
}

export class SearchManager {
  constructor(
    private ctx: SyncContext,
    private tasks: TaskManager
  ) {}

  /**
   * Raw search result across tasks, tags, lists and filters
   */
  async search(keywords: string): Promise<WireRecord> {
    const response = await this.ctx.http.get(ENDPOINTS.SEARCH, { params: { keywords } });
    return response.empty ? {} : asRecord(response.data, 'search result');
  }

  async searchTasks(keywords: string): Promise<Task[]> {
    const result = await this.search(keywords);
    if (!('tasks' in result)) return [];
    return extractRecords(result, 'tasks').map(TaskModel.fromWire);
  }

  /**
   * Filter the open tasks of a full sync; tag matching ignores case
   */
  async filterTasks(criteria: TaskCriteria): Promise<Task[]> {
    const tag = criteria.tag?.toLowerCase();
    const tasks = await this.tasks.getAll();
    return tasks.filter(task => {
      if (criteria.projectId !== undefined && task.projectId !== criteria.projectId) return false;
      if (tag !== undefined && !task.tags.some(t => t.toLowerCase() === tag)) return false;
      if (criteria.priority !== undefined && task.priority !== criteria.priority) return false;
      if (criteria.status !== undefined && task.status !== criteria.status) return false;
      if (criteria.hasDueDate !== undefined && (task.dueDate !== undefined) !== criteria.hasDueDate) return false;
      return true;
    });
  }
}
