/**
 * Record models with wire conversion utilities
 */

import { format, isValid, parseISO } from 'date-fns';
import { CONSTANTS } from './constants';
import { ProtocolError } from './errors';
import type {
  Column,
  Filter,
  Habit,
  HabitCheckin,
  Project,
  ProjectGroup,
  Reminder,
  SortOption,
  Subtask,
  Tag,
  Task,
  WireRecord,
} from './types';

// ── Field readers ──────────────────────────────────────────────────

function str(d: WireRecord, key: string, fallback: string = ''): string {
  const value = d[key];
  return typeof value === 'string' ? value : fallback;
}

function strOrNull(d: WireRecord, key: string): string | null {
  const value = d[key];
  return typeof value === 'string' ? value : null;
}

function num(d: WireRecord, key: string, fallback: number = 0): number {
  const value = d[key];
  return typeof value === 'number' && !Number.isNaN(value) ? value : fallback;
}

function bool(d: WireRecord, key: string, fallback: boolean = false): boolean {
  const value = d[key];
  return typeof value === 'boolean' ? value : fallback;
}

function isRecord(value: unknown): value is WireRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function records(d: WireRecord, key: string): WireRecord[] {
  const value = d[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function strings(d: WireRecord, key: string): string[] {
  const value = d[key];
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function requireId(d: WireRecord, kind: string): string {
  const id = d.id;
  if (typeof id !== 'string' || id === '') {
    throw new ProtocolError(`${kind} record has no id`, 'id');
  }
  return id;
}

// ── Dates ──────────────────────────────────────────────────────────

/**
 * Parse a wire timestamp ("2024-03-15T07:30:00.000+0000" or "2024-03-15 07:30:00")
 */
export function parseWireDate(value: unknown): Date | undefined {
  if (typeof value !== 'string' || value === '') return undefined;
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : undefined;
}

/**
 * Format a date the way the API stores it: UTC, millisecond field zeroed
 */
export function formatWireDate(date: Date): string {
  return `${date.toISOString().slice(0, 19)}.000+0000`;
}

/**
 * Date range bound for the completed-task queries ("2024-03-15 07:30:00")
 */
export function toQueryDate(value: Date | string): string {
  return typeof value === 'string' ? value : format(value, 'yyyy-MM-dd HH:mm:ss');
}

/**
 * Local calendar day as a yyyyMMdd stamp (habit check-ins, target dates)
 */
export function toDateStamp(date: Date): string {
  return format(date, 'yyyyMMdd');
}

// ── Models ─────────────────────────────────────────────────────────

export class SortOptionModel {
  static fromWire(d: unknown): SortOption {
    if (!isRecord(d)) {
      return { groupBy: 'sortOrder', orderBy: 'sortOrder', order: null };
    }
    return {
      groupBy: str(d, 'groupBy', 'sortOrder'),
      orderBy: str(d, 'orderBy', 'sortOrder'),
      order: strOrNull(d, 'order'),
    };
  }

  static toWire(option: SortOption): WireRecord {
    return { groupBy: option.groupBy, orderBy: option.orderBy, order: option.order };
  }
}

export class SubtaskModel {
  static fromWire(d: WireRecord): Subtask {
    return {
      id: requireId(d, 'Subtask'),
      title: str(d, 'title'),
      status: num(d, 'status'),
      sortOrder: num(d, 'sortOrder'),
      startDate: parseWireDate(d.startDate),
      isAllDay: bool(d, 'isAllDay'),
      timeZone: str(d, 'timeZone'),
      completedTime: parseWireDate(d.completedTime),
    };
  }

  static toWire(item: Subtask): WireRecord {
    const d: WireRecord = { id: item.id, title: item.title, status: item.status, sortOrder: item.sortOrder };
    if (item.startDate) d.startDate = formatWireDate(item.startDate);
    d.isAllDay = item.isAllDay;
    if (item.timeZone) d.timeZone = item.timeZone;
    if (item.completedTime) d.completedTime = formatWireDate(item.completedTime);
    return d;
  }
}

export class ReminderModel {
  static fromWire(d: WireRecord): Reminder {
    return { id: requireId(d, 'Reminder'), trigger: str(d, 'trigger') };
  }

  static toWire(reminder: Reminder): WireRecord {
    return { id: reminder.id, trigger: reminder.trigger };
  }
}

export class TaskModel {
  /**
   * Create Task from a sync or task endpoint record
   */
  static fromWire(d: WireRecord): Task {
    return {
      id: requireId(d, 'Task'),
      projectId: str(d, 'projectId'),
      title: str(d, 'title'),
      content: str(d, 'content'),
      desc: str(d, 'desc'),
      priority: num(d, 'priority'),
      status: num(d, 'status'),
      tags: strings(d, 'tags'),
      items: records(d, 'items').map(SubtaskModel.fromWire),
      reminders: records(d, 'reminders').map(ReminderModel.fromWire),
      startDate: parseWireDate(d.startDate),
      dueDate: parseWireDate(d.dueDate),
      isAllDay: bool(d, 'isAllDay'),
      isFloating: bool(d, 'isFloating'),
      timeZone: str(d, 'timeZone'),
      repeatFlag: str(d, 'repeatFlag'),
      repeatFrom: str(d, 'repeatFrom'),
      sortOrder: num(d, 'sortOrder'),
      progress: num(d, 'progress'),
      kind: str(d, 'kind', 'TEXT'),
      parentId: str(d, 'parentId'),
      columnId: str(d, 'columnId'),
      etag: str(d, 'etag'),
      deleted: num(d, 'deleted'),
      createdTime: parseWireDate(d.createdTime),
      modifiedTime: parseWireDate(d.modifiedTime),
      creator: num(d, 'creator'),
      commentCount: num(d, 'commentCount'),
      attachments: records(d, 'attachments'),
      childIds: strings(d, 'childIds'),
    };
  }

  /**
   * Convert Task to the API format
   */
  static toWire(task: Task): WireRecord {
    const d: WireRecord = {
      id: task.id,
      projectId: task.projectId,
      title: task.title,
      content: task.content,
      desc: task.desc,
      priority: task.priority,
      status: task.status,
      isAllDay: task.isAllDay,
      isFloating: task.isFloating,
      kind: task.kind,
      sortOrder: task.sortOrder,
      items: task.items.map(SubtaskModel.toWire),
      reminders: task.reminders.map(ReminderModel.toWire),
      tags: task.tags,
      progress: task.progress,
    };
    if (task.timeZone) d.timeZone = task.timeZone;
    if (task.startDate) d.startDate = formatWireDate(task.startDate);
    if (task.dueDate) d.dueDate = formatWireDate(task.dueDate);
    if (task.repeatFlag) d.repeatFlag = task.repeatFlag;
    if (task.repeatFrom) d.repeatFrom = task.repeatFrom;
    if (task.parentId) d.parentId = task.parentId;
    if (task.columnId) d.columnId = task.columnId;
    if (task.etag) d.etag = task.etag;
    if (task.attachments.length > 0) d.attachments = task.attachments;
    if (task.childIds.length > 0) d.childIds = task.childIds;
    return d;
  }

  /**
   * Next free subtask sort order after the existing items
   */
  static nextSubtaskSortOrder(task: Task): number {
    const max = task.items.reduce((acc, item) => Math.max(acc, item.sortOrder), -CONSTANTS.SUBTASK_SORT_STEP);
    return max + CONSTANTS.SUBTASK_SORT_STEP;
  }
}

export class ProjectModel {
  static fromWire(d: WireRecord): Project {
    const closed = d.closed;
    return {
      id: requireId(d, 'Project'),
      name: str(d, 'name'),
      isOwner: bool(d, 'isOwner', true),
      color: strOrNull(d, 'color'),
      sortOrder: num(d, 'sortOrder'),
      sortType: str(d, 'sortType', 'sortOrder'),
      sortOption: SortOptionModel.fromWire(d.sortOption),
      userCount: num(d, 'userCount', 1),
      etag: str(d, 'etag'),
      modifiedTime: parseWireDate(d.modifiedTime),
      inAll: bool(d, 'inAll', true),
      showType: num(d, 'showType'),
      muted: bool(d, 'muted'),
      closed: typeof closed === 'boolean' ? closed : null,
      groupId: strOrNull(d, 'groupId'),
      viewMode: str(d, 'viewMode', 'list'),
      kind: str(d, 'kind', 'TASK'),
      teamId: strOrNull(d, 'teamId'),
      source: num(d, 'source'),
      background: strOrNull(d, 'background'),
    };
  }

  static toWire(project: Project): WireRecord {
    const d: WireRecord = {
      id: project.id,
      name: project.name,
      sortOrder: project.sortOrder,
      sortType: project.sortType,
      sortOption: SortOptionModel.toWire(project.sortOption),
      viewMode: project.viewMode,
      kind: project.kind,
      inAll: project.inAll,
    };
    if (project.color) d.color = project.color;
    // Moving a project out of its folder needs an explicit null on the wire
    d.groupId = project.groupId;
    if (project.closed !== null) d.closed = project.closed;
    return d;
  }
}

export class ProjectGroupModel {
  static fromWire(d: WireRecord): ProjectGroup {
    return {
      id: requireId(d, 'ProjectGroup'),
      name: str(d, 'name'),
      showAll: bool(d, 'showAll', true),
      sortOrder: num(d, 'sortOrder'),
      viewMode: strOrNull(d, 'viewMode'),
      sortType: strOrNull(d, 'sortType'),
      etag: str(d, 'etag'),
    };
  }

  static toWire(group: ProjectGroup): WireRecord {
    return { id: group.id, name: group.name, showAll: group.showAll, sortOrder: group.sortOrder };
  }
}

export class TagModel {
  /**
   * Tag names come back lowercased whatever the server stored; the label keeps display case
   */
  static fromWire(d: WireRecord): Tag {
    const name = str(d, 'name').toLowerCase();
    const separator = name.lastIndexOf(CONSTANTS.TAG_SEPARATOR);
    return {
      name,
      rawName: str(d, 'rawName'),
      label: str(d, 'label'),
      sortOrder: num(d, 'sortOrder'),
      sortType: str(d, 'sortType'),
      color: str(d, 'color'),
      etag: str(d, 'etag'),
      type: num(d, 'type'),
      parent: separator > 0 ? name.slice(0, separator) : '',
      sortOption: SortOptionModel.fromWire(d.sortOption),
    };
  }

  static toWire(tag: Tag): WireRecord {
    return {
      name: tag.name,
      label: tag.label,
      sortOrder: tag.sortOrder,
      sortType: tag.sortType,
      color: tag.color,
    };
  }
}

export class FilterModel {
  static fromWire(d: WireRecord): Filter {
    return {
      id: requireId(d, 'Filter'),
      name: str(d, 'name'),
      rule: str(d, 'rule'),
      sortOrder: num(d, 'sortOrder'),
      sortType: str(d, 'sortType'),
      viewMode: str(d, 'viewMode', 'list'),
      etag: str(d, 'etag'),
      createdTime: parseWireDate(d.createdTime),
      modifiedTime: parseWireDate(d.modifiedTime),
      sortOption: SortOptionModel.fromWire(d.sortOption),
    };
  }

  static toWire(filter: Filter): WireRecord {
    return {
      id: filter.id,
      name: filter.name,
      rule: filter.rule,
      sortOrder: filter.sortOrder,
      sortType: filter.sortType,
      viewMode: filter.viewMode,
    };
  }
}

export class HabitModel {
  static fromWire(d: WireRecord): Habit {
    const reminders = d.reminders;
    return {
      id: requireId(d, 'Habit'),
      name: str(d, 'name'),
      iconRes: str(d, 'iconRes'),
      color: str(d, 'color'),
      sortOrder: num(d, 'sortOrder'),
      status: num(d, 'status'),
      encouragement: str(d, 'encouragement'),
      totalCheckIns: num(d, 'totalCheckIns'),
      type: str(d, 'type', 'Boolean'),
      goal: num(d, 'goal', 1),
      step: num(d, 'step', 1),
      unit: str(d, 'unit', 'Count'),
      repeatRule: str(d, 'repeatRule'),
      reminders: Array.isArray(reminders)
        ? reminders.filter((r): r is string | WireRecord => typeof r === 'string' || isRecord(r))
        : [],
      recordEnable: bool(d, 'recordEnable'),
      sectionId: str(d, 'sectionId'),
      targetDays: num(d, 'targetDays'),
      targetStartDate: num(d, 'targetStartDate'),
      completedCycles: num(d, 'completedCycles'),
      createdTime: parseWireDate(d.createdTime),
      modifiedTime: parseWireDate(d.modifiedTime),
      archivedTime: parseWireDate(d.archivedTime),
      etag: str(d, 'etag'),
    };
  }

  static toWire(habit: Habit): WireRecord {
    return {
      id: habit.id,
      name: habit.name,
      iconRes: habit.iconRes,
      color: habit.color,
      sortOrder: habit.sortOrder,
      status: habit.status,
      encouragement: habit.encouragement,
      type: habit.type,
      goal: habit.goal,
      step: habit.step,
      unit: habit.unit,
      repeatRule: habit.repeatRule,
      reminders: habit.reminders,
      recordEnable: habit.recordEnable,
      sectionId: habit.sectionId,
      targetDays: habit.targetDays,
      targetStartDate: habit.targetStartDate,
    };
  }
}

export class HabitCheckinModel {
  static fromWire(d: WireRecord): HabitCheckin {
    return {
      id: str(d, 'id'),
      habitId: str(d, 'habitId'),
      status: num(d, 'status'),
      value: num(d, 'value'),
      checkinStamp: str(d, 'checkinStamp'),
      checkinTime: parseWireDate(d.checkinTime),
      goal: num(d, 'goal', 1),
      etag: str(d, 'etag'),
    };
  }

  static toWire(checkin: HabitCheckin): WireRecord {
    const d: WireRecord = {
      id: checkin.id,
      habitId: checkin.habitId,
      status: checkin.status,
      value: checkin.value,
      checkinStamp: checkin.checkinStamp,
    };
    if (checkin.goal) d.goal = checkin.goal;
    if (checkin.checkinTime) d.checkinTime = formatWireDate(checkin.checkinTime);
    return d;
  }
}

export class ColumnModel {
  static fromWire(d: WireRecord): Column {
    return {
      id: requireId(d, 'Column'),
      projectId: str(d, 'projectId'),
      name: str(d, 'name'),
      sortOrder: num(d, 'sortOrder'),
      etag: str(d, 'etag'),
    };
  }

  static toWire(column: Column): WireRecord {
    return { id: column.id, projectId: column.projectId, name: column.name, sortOrder: column.sortOrder };
  }
}
