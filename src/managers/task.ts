/**
 * Tasks, subtasks, completion and trash
 */

import { extractRecords, generateObjectId } from '../batchWriter';
import { CONSTANTS, ENDPOINTS } from '../constants';
import { formatWireDate, SubtaskModel, TaskModel, toQueryDate } from '../models';
import { collectionItems } from '../reconciliation';
import { TaskStatus } from '../types';
import type { BatchWriteResult, Task, WireRecord } from '../types';
import { asRecord, writtenRecord } from './context';
import type { SyncContext } from './context';

export interface SubtaskInput {
  id?: string;
  title: string;
  status?: number;
  sortOrder?: number;
}

export interface CreateTaskOptions {
  /** Defaults to the inbox */
  projectId?: string;
  content?: string;
  desc?: string;
  priority?: number;
  tags?: string[];
  startDate?: Date;
  dueDate?: Date;
  isAllDay?: boolean;
  timeZone?: string;
  /** iCal RRULE, e.g. "RRULE:FREQ=DAILY;INTERVAL=1" */
  repeatFlag?: string;
  items?: SubtaskInput[];
  reminders?: Array<{ id: string; trigger: string }>;
  parentId?: string;
  columnId?: string;
  kind?: 'TEXT' | 'NOTE' | 'CHECKLIST';
  sortOrder?: number;
}

export interface CompletedQuery {
  from?: Date | string;
  to?: Date | string;
  limit?: number;
}

export interface TaskKey {
  taskId: string;
  projectId: string;
}

export type TaskFields = Partial<Omit<Task, 'id'>>;

export class TaskManager {
  constructor(private ctx: SyncContext) {}

  // ── Read ──────────────────────────────────────────────────────────

  async get(taskId: string, projectId: string): Promise<Task> {
    const response = await this.ctx.http.get(`${ENDPOINTS.TASK}/${encodeURIComponent(taskId)}`, {
      params: { projectId },
    });
    return TaskModel.fromWire(asRecord(response.data, 'task'));
  }

  /**
   * Every open task, from a full sync
   */
  async getAll(): Promise<Task[]> {
    const resolved = await this.ctx.engine.resolve('taskSet', true);
    return collectionItems(resolved).update.map(TaskModel.fromWire);
  }

  async getByProject(projectId: string): Promise<Task[]> {
    const tasks = await this.getAll();
    return tasks.filter(task => task.projectId === projectId);
  }

  /**
   * Completed tasks of one project, or of all projects when none is given
   */
  async getCompleted(projectId?: string, query: CompletedQuery = {}): Promise<Task[]> {
    const endpoint = projectId
      ? `${ENDPOINTS.PROJECT}/${encodeURIComponent(projectId)}/completed/`
      : ENDPOINTS.PROJECT_COMPLETED_ALL;
    const response = await this.ctx.http.get(endpoint, { params: this.completedParams(query, 50) });
    return extractRecords(response.data).map(TaskModel.fromWire);
  }

  async getCompletedInAll(query: CompletedQuery = {}): Promise<Task[]> {
    const response = await this.ctx.http.get(ENDPOINTS.PROJECT_COMPLETED_IN_ALL, {
      params: this.completedParams(query, 1200),
    });
    return extractRecords(response.data).map(TaskModel.fromWire);
  }

  async getTrash(limit: number = 50): Promise<Task[]> {
    const response = await this.ctx.http.get(ENDPOINTS.PROJECT_TRASH, { params: { limit } });
    if (response.empty) return [];
    return extractRecords(response.data, 'tasks').map(TaskModel.fromWire);
  }

  // ── Write ─────────────────────────────────────────────────────────

  async create(title: string, options: CreateTaskOptions = {}): Promise<Task> {
    const id = generateObjectId();
    const result = await this.ctx.writer.submit('task', [this.buildTask(id, title, options)]);
    return TaskModel.fromWire(writtenRecord(result, id));
  }

  async update(task: Task): Promise<Task> {
    const result = await this.ctx.writer.submit('task', [], [TaskModel.toWire(task)]);
    return TaskModel.fromWire(writtenRecord(result, task.id));
  }

  /**
   * Fetch, merge the given fields and save
   */
  async updateFields(taskId: string, projectId: string, fields: TaskFields): Promise<Task> {
    const task = await this.get(taskId, projectId);
    return this.update({ ...task, ...fields, id: task.id });
  }

  complete(taskId: string, projectId: string): Promise<Task> {
    return this.updateFields(taskId, projectId, { status: TaskStatus.COMPLETED });
  }

  uncomplete(taskId: string, projectId: string): Promise<Task> {
    return this.updateFields(taskId, projectId, { status: TaskStatus.OPEN });
  }

  /**
   * Move to trash. Deleting a task that is already gone still succeeds.
   */
  async delete(taskId: string, projectId: string): Promise<void> {
    await this.ctx.writer.submit('task', [], [], [{ taskId, projectId }]);
  }

  batchCreate(tasks: WireRecord[]): Promise<BatchWriteResult> {
    return this.ctx.writer.submit('task', tasks);
  }

  batchUpdate(tasks: WireRecord[]): Promise<BatchWriteResult> {
    return this.ctx.writer.submit('task', [], tasks);
  }

  batchDelete(keys: TaskKey[]): Promise<BatchWriteResult> {
    return this.ctx.writer.submit('task', [], [], keys.map(key => ({ taskId: key.taskId, projectId: key.projectId })));
  }

  async move(taskId: string, fromProject: string, toProject: string): Promise<Task> {
    return this.updateFields(taskId, fromProject, { projectId: toProject });
  }

  /**
   * Nest a task under another one
   */
  async setParent(taskId: string, projectId: string, parentId: string): Promise<WireRecord> {
    const response = await this.ctx.http.post(ENDPOINTS.TASK_PARENT, {
      data: [{ taskId, projectId, parentId }],
    });
    return response.empty ? {} : asRecord(response.data, 'task parent response');
  }

  // ── Subtasks ──────────────────────────────────────────────────────

  async addSubtask(taskId: string, projectId: string, title: string): Promise<Task> {
    const task = await this.get(taskId, projectId);
    const item = SubtaskModel.fromWire({
      id: generateObjectId(),
      title,
      status: TaskStatus.OPEN,
      sortOrder: TaskModel.nextSubtaskSortOrder(task),
    });
    return this.update({ ...task, items: [...task.items, item] });
  }

  async completeSubtask(taskId: string, projectId: string, subtaskId: string): Promise<Task> {
    const task = await this.get(taskId, projectId);
    const completedTime = new Date();
    const items = task.items.map(item =>
      item.id === subtaskId ? { ...item, status: TaskStatus.COMPLETED, completedTime } : item
    );
    return this.update({ ...task, items });
  }

  async removeSubtask(taskId: string, projectId: string, subtaskId: string): Promise<Task> {
    const task = await this.get(taskId, projectId);
    return this.update({ ...task, items: task.items.filter(item => item.id !== subtaskId) });
  }

  private completedParams(query: CompletedQuery, defaultLimit: number): Record<string, string | number> {
    const params: Record<string, string | number> = { limit: query.limit ?? defaultLimit };
    if (query.from) params.from = toQueryDate(query.from);
    if (query.to) params.to = toQueryDate(query.to);
    return params;
  }

  private buildTask(id: string, title: string, options: CreateTaskOptions): WireRecord {
    const payload: WireRecord = {
      id,
      projectId: options.projectId ?? (this.ctx.engine.getInboxId() || 'inbox'),
      title,
      content: options.content ?? '',
      desc: options.desc ?? '',
      priority: options.priority ?? 0,
      status: TaskStatus.OPEN,
      isAllDay: options.isAllDay ?? false,
      kind: options.kind ?? 'TEXT',
      sortOrder: options.sortOrder ?? 0,
      items: (options.items ?? []).map((item, index) => ({
        id: item.id ?? generateObjectId(),
        title: item.title,
        status: item.status ?? TaskStatus.OPEN,
        sortOrder: item.sortOrder ?? index * CONSTANTS.SUBTASK_SORT_STEP,
        isAllDay: false,
      })),
      reminders: options.reminders ?? [],
      tags: options.tags ?? [],
    };
    if (options.timeZone) payload.timeZone = options.timeZone;
    if (options.startDate) payload.startDate = formatWireDate(options.startDate);
    if (options.dueDate) payload.dueDate = formatWireDate(options.dueDate);
    if (options.repeatFlag) payload.repeatFlag = options.repeatFlag;
    if (options.parentId) payload.parentId = options.parentId;
    if (options.columnId) payload.columnId = options.columnId;
    return payload;
  }
}
