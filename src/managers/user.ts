/**
 * Profile, account status, preferences, limits, notifications and calendars
 */

import { extractRecords } from '../batchWriter';
import { ENDPOINTS } from '../constants';
import { ProtocolError } from '../errors';
import type { RequestOptions } from '../http';
import type { WireRecord } from '../types';
import { asRecord } from './context';
import type { SyncContext } from './context';

export class UserManager {
  constructor(private ctx: SyncContext) {}

  getProfile(): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_PROFILE, 'profile');
  }

  getStatus(): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_STATUS, 'account status');
  }

  /**
   * Linked third-party sign-in accounts
   */
  getBindingInfo(): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_BINDING_INFO, 'binding info');
  }

  getSettings(includeWeb: boolean = true): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_SETTINGS, 'settings', { includeWeb: String(includeWeb) });
  }

  async updateSettings(settings: WireRecord): Promise<WireRecord> {
    const response = await this.ctx.http.post(ENDPOINTS.USER_SETTINGS, { data: settings });
    return response.empty ? {} : asRecord(response.data, 'settings');
  }

  getDailyReminder(): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_DAILY_REMINDER, 'daily reminder');
  }

  getFeaturePrompts(): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_FEATURE_PROMPTS, 'feature prompts');
  }

  getHabitPreferences(platform: string = 'web'): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_HABIT_PREFERENCES, 'habit preferences', { platform });
  }

  /**
   * Extended preferences changed after `mtime`
   */
  getExtPreferences(mtime: number = 0): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_EXT_PREFERENCES, 'extended preferences', { mtime });
  }

  getLimits(): Promise<WireRecord> {
    return this.read(ENDPOINTS.USER_LIMITS, 'account limits');
  }

  async isUnderAttachmentQuota(): Promise<boolean> {
    const response = await this.ctx.http.get(ENDPOINTS.ATTACHMENT_QUOTA);
    if (typeof response.data !== 'boolean') {
      throw new ProtocolError('Expected the attachment quota check to answer true or false');
    }
    return response.data;
  }

  getUnreadNotifications(): Promise<WireRecord[]> {
    return this.readList(ENDPOINTS.NOTIFICATIONS_UNREAD);
  }

  getCalendarAccounts(): Promise<WireRecord[]> {
    return this.readList(ENDPOINTS.CALENDAR_ACCOUNTS);
  }

  getCalendarSubscriptions(): Promise<WireRecord[]> {
    return this.readList(ENDPOINTS.CALENDAR_SUBSCRIPTIONS);
  }

  getCalendarEvents(): Promise<WireRecord[]> {
    return this.readList(ENDPOINTS.CALENDAR_EVENTS);
  }

  private async read(endpoint: string, what: string, params?: RequestOptions['params']): Promise<WireRecord> {
    const response = await this.ctx.http.get(endpoint, { params });
    return asRecord(response.data, what);
  }

  private async readList(endpoint: string): Promise<WireRecord[]> {
    const response = await this.ctx.http.get(endpoint);
    return response.empty ? [] : extractRecords(response.data);
  }
}
