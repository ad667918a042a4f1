/**
 * Habits and habit check-ins
 */

import { extractRecords, generateObjectId } from '../batchWriter';
import { ENDPOINTS } from '../constants';
import { SyncClientError } from '../errors';
import { HabitCheckinModel, HabitModel, toDateStamp } from '../models';
import type { BatchWriteResult, Habit, HabitCheckin, WireRecord } from '../types';
import { asRecord, writtenRecord } from './context';
import type { SyncContext } from './context';

const HABIT_ACTIVE = 0;
const HABIT_ARCHIVED = 1;
const CHECKIN_DONE = 2;

export interface CreateHabitOptions {
  iconRes?: string;
  color?: string;
  /** "Boolean" for yes/no habits, "Real" for numeric tracking */
  type?: 'Boolean' | 'Real';
  goal?: number;
  step?: number;
  unit?: string;
  repeatRule?: string;
  encouragement?: string;
  sectionId?: string;
  targetDays?: number;
  /** yyyyMMdd; defaults to today */
  targetStartDate?: number;
  reminders?: Array<string | WireRecord>;
}

export interface CheckinOptions {
  /** yyyyMMdd; defaults to today */
  stamp?: string;
  value?: number;
  /** 0 unchecked, 2 checked */
  status?: number;
}

export class HabitManager {
  constructor(private ctx: SyncContext) {}

  /**
   * Active and archived habits
   */
  async getAll(): Promise<Habit[]> {
    const response = await this.ctx.http.get(ENDPOINTS.HABITS);
    if (response.empty) return [];
    return extractRecords(response.data).map(HabitModel.fromWire);
  }

  async getActive(): Promise<Habit[]> {
    const habits = await this.getAll();
    return habits.filter(habit => habit.status === HABIT_ACTIVE);
  }

  async getArchived(): Promise<Habit[]> {
    const habits = await this.getAll();
    return habits.filter(habit => habit.status === HABIT_ARCHIVED);
  }

  async get(habitId: string): Promise<Habit | undefined> {
    const habits = await this.getAll();
    return habits.find(habit => habit.id === habitId);
  }

  /**
   * Where habits show up (calendar, today list) and similar display settings
   */
  async getPreferences(): Promise<WireRecord> {
    const response = await this.ctx.http.get(ENDPOINTS.USER_HABIT_PREFERENCES, { params: { platform: 'web' } });
    return response.empty ? {} : asRecord(response.data, 'habit preferences');
  }

  async create(name: string, options: CreateHabitOptions = {}): Promise<Habit> {
    const id = generateObjectId();
    const result = await this.ctx.writer.submit('habit', [
      {
        id,
        name,
        iconRes: options.iconRes ?? 'habit_daily_check_in',
        color: options.color ?? '#7BC4FA',
        type: options.type ?? 'Boolean',
        goal: options.goal ?? 1,
        step: options.step ?? 1,
        unit: options.unit ?? 'Count',
        repeatRule: options.repeatRule ?? 'RRULE:FREQ=DAILY;INTERVAL=1',
        encouragement: options.encouragement ?? '',
        sectionId: options.sectionId ?? '-1',
        targetDays: options.targetDays ?? 0,
        targetStartDate: options.targetStartDate || Number(toDateStamp(new Date())),
        reminders: options.reminders ?? [],
        recordEnable: false,
        status: HABIT_ACTIVE,
      },
    ]);
    return HabitModel.fromWire(writtenRecord(result, id));
  }

  async update(habit: Habit): Promise<Habit> {
    const result = await this.ctx.writer.submit('habit', [], [HabitModel.toWire(habit)]);
    return HabitModel.fromWire(writtenRecord(result, habit.id));
  }

  archive(habitId: string): Promise<Habit> {
    return this.setStatus(habitId, HABIT_ARCHIVED);
  }

  unarchive(habitId: string): Promise<Habit> {
    return this.setStatus(habitId, HABIT_ACTIVE);
  }

  async delete(habitId: string): Promise<void> {
    await this.ctx.writer.submit('habit', [], [], [habitId]);
  }

  // ── Check-ins ─────────────────────────────────────────────────────

  async checkin(habitId: string, options: CheckinOptions = {}): Promise<HabitCheckin> {
    const id = generateObjectId();
    const result = await this.ctx.writer.submit('habitCheckin', [
      {
        id,
        habitId,
        checkinStamp: options.stamp || toDateStamp(new Date()),
        value: options.value ?? 1,
        status: options.status ?? CHECKIN_DONE,
      },
    ]);
    return HabitCheckinModel.fromWire(writtenRecord(result, id));
  }

  /**
   * Several check-ins in one call. Each record needs habitId, checkinStamp, value and status.
   */
  batchCheckin(checkins: WireRecord[]): Promise<BatchWriteResult> {
    return this.ctx.writer.submit('habitCheckin', checkins);
  }

  async getCheckins(habitIds: string[] = [], afterStamp: string = ''): Promise<HabitCheckin[]> {
    const query: WireRecord = {};
    if (habitIds.length > 0) query.habitIds = habitIds;
    if (afterStamp) query.afterStamp = afterStamp;

    const response = await this.ctx.http.post(ENDPOINTS.HABIT_CHECKIN_QUERY, { data: query });
    if (response.empty) return [];
    return extractRecords(response.data, 'checkins').map(HabitCheckinModel.fromWire);
  }

  private async setStatus(habitId: string, status: number): Promise<Habit> {
    const habit = await this.get(habitId);
    if (!habit) {
      throw new SyncClientError(`Habit ${habitId} not found`, 'NOT_FOUND');
    }
    return this.update({ ...habit, status });
  }
}
