import { describe, expect, it } from 'vitest';
import { ProtocolError } from './errors';
import {
  formatWireDate,
  HabitModel,
  parseWireDate,
  ProjectModel,
  TagModel,
  TaskModel,
  toDateStamp,
  toQueryDate,
} from './models';

describe('wire dates', () => {
  it('should parse the API timestamp format as UTC', () => {
    expect(parseWireDate('2024-03-15T07:30:00.000+0000')?.toISOString()).toBe('2024-03-15T07:30:00.000Z');
  });

  it('should return undefined for missing or unparseable values', () => {
    expect(parseWireDate(undefined)).toBeUndefined();
    expect(parseWireDate('')).toBeUndefined();
    expect(parseWireDate('next tuesday')).toBeUndefined();
    expect(parseWireDate(1710487800000)).toBeUndefined();
  });

  it('should format dates in UTC with a zeroed millisecond field', () => {
    expect(formatWireDate(new Date(Date.UTC(2024, 2, 15, 7, 30, 45, 123)))).toBe('2024-03-15T07:30:45.000+0000');
  });

  it('should build local day stamps and query bounds', () => {
    expect(toDateStamp(new Date(2024, 0, 5, 23, 59))).toBe('20240105');
    expect(toQueryDate(new Date(2024, 0, 5, 9, 8, 7))).toBe('2024-01-05 09:08:07');
    expect(toQueryDate('2024-01-05 00:00:00')).toBe('2024-01-05 00:00:00');
  });
});

describe('TaskModel', () => {
  it('should read a task record with defaults for missing fields', () => {
    const task = TaskModel.fromWire({
      id: 't1',
      projectId: 'p1',
      title: 'Pay rent',
      priority: 5,
      tags: ['home', 7],
      dueDate: '2024-03-15T07:30:00.000+0000',
      items: [{ id: 's1', title: 'Transfer', status: 2, sortOrder: 0 }],
    });

    expect(task.title).toBe('Pay rent');
    expect(task.priority).toBe(5);
    expect(task.tags).toEqual(['home']);
    expect(task.kind).toBe('TEXT');
    expect(task.dueDate?.toISOString()).toBe('2024-03-15T07:30:00.000Z');
    expect(task.startDate).toBeUndefined();
    expect(task.items).toHaveLength(1);
    expect(task.items[0]).toMatchObject({ id: 's1', title: 'Transfer', status: 2 });
  });

  it('should refuse a record without an id', () => {
    expect(() => TaskModel.fromWire({ title: 'Nameless' })).toThrow('Task record has no id');
    expect(() => TaskModel.fromWire({ title: 'Nameless' })).toThrow(ProtocolError);
  });

  it('should leave unset optional fields off the wire', () => {
    const wire = TaskModel.toWire(TaskModel.fromWire({ id: 't1', projectId: 'p1', title: 'Pay rent' }));

    expect(wire).not.toHaveProperty('parentId');
    expect(wire).not.toHaveProperty('dueDate');
    expect(wire).toMatchObject({ id: 't1', projectId: 'p1', title: 'Pay rent', status: 0, items: [], tags: [] });
  });

  it('should place a new subtask one step after the last one', () => {
    const empty = TaskModel.fromWire({ id: 't1' });
    const withItems = TaskModel.fromWire({ id: 't2', items: [{ id: 's1', sortOrder: 5 }] });

    expect(TaskModel.nextSubtaskSortOrder(empty)).toBe(0);
    expect(TaskModel.nextSubtaskSortOrder(withItems)).toBe(5 + 1099511627776);
  });
});

describe('TagModel', () => {
  it('should lowercase the name and derive the parent from it', () => {
    const tag = TagModel.fromWire({ name: 'Work/Deep', label: 'Deep' });

    expect(tag.name).toBe('work/deep');
    expect(tag.parent).toBe('work');
    expect(tag.label).toBe('Deep');
  });

  it('should give top-level tags no parent', () => {
    expect(TagModel.fromWire({ name: 'errands' }).parent).toBe('');
  });
});

describe('ProjectModel', () => {
  it('should send an explicit null group id', () => {
    const project = ProjectModel.fromWire({ id: 'p1', name: 'Inbox', groupId: 'g1' });

    expect(ProjectModel.toWire({ ...project, groupId: null }).groupId).toBeNull();
    expect(project.closed).toBeNull();
    expect(project.sortOption).toEqual({ groupBy: 'sortOrder', orderBy: 'sortOrder', order: null });
  });
});

describe('HabitModel', () => {
  it('should keep string and record reminders only', () => {
    const habit = HabitModel.fromWire({ id: 'h1', name: 'Read', reminders: ['09:00', { time: '21:00' }, 3] });

    expect(habit.reminders).toEqual(['09:00', { time: '21:00' }]);
    expect(habit.type).toBe('Boolean');
    expect(habit.goal).toBe(1);
  });
});
