/**
 * Application constants and configuration
 */

import type { CollectionName, EntityType } from './types';

export const CONSTANTS = {
  /**
   * Default API host used by the web app
   */
  BASE_URL: 'https://api.ticktick.com',

  /**
   * Checkpoint value that asks the server for everything
   */
  FULL_SYNC_CHECKPOINT: 0,

  /**
   * Separator that turns a tag name into a "parent/child" hierarchy
   */
  TAG_SEPARATOR: '/',

  /**
   * Status returned when an entity type cannot be written under the current auth mode
   */
  WRITE_REJECTED_STATUS: 405,

  /**
   * Default request timeout in milliseconds
   */
  REQUEST_TIMEOUT_MS: 30000,

  /**
   * Gap between sort orders of consecutive subtasks (2^40, what the web app uses)
   */
  SUBTASK_SORT_STEP: 1099511627776,

  /**
   * Stale lock age for the CLI runner
   */
  LOCK_STALE_MS: 30 * 60 * 1000,
} as const;

export const ENDPOINTS = {
  BATCH_CHECK: '/api/v3/batch/check',
  TASK: '/api/v2/task',
  TASK_PARENT: '/api/v2/batch/taskParent',
  PROJECT: '/api/v2/project',
  PROJECT_COMPLETED_ALL: '/api/v2/project/all/completed/',
  PROJECT_COMPLETED_IN_ALL: '/api/v2/project/all/completedInAll/',
  PROJECT_TRASH: '/api/v2/project/all/trash/pagination',
  TAG_RENAME: '/api/v2/tag/rename',
  TAG_COMPLETED_TASKS: '/api/v2/tag/completedTask',
  TEMPLATES: '/api/v2/templates',
  PROJECT_TEMPLATES: '/api/v2/projectTemplates/all',
  HABITS: '/api/v2/habits',
  HABIT_CHECKIN_QUERY: '/api/v2/habitCheckins/query',
  COLUMN_BY_PROJECT: '/api/v2/column/project',
  COLUMN: '/api/v2/column',
  SEARCH: '/api/v2/search/all',
  USER_PROFILE: '/api/v2/user/profile',
  USER_STATUS: '/api/v2/user/status',
  USER_BINDING_INFO: '/api/v2/user/userBindingInfo',
  USER_SETTINGS: '/api/v2/user/preferences/settings',
  USER_DAILY_REMINDER: '/api/v2/user/preferences/dailyReminder',
  USER_FEATURE_PROMPTS: '/api/v2/user/preferences/featurePrompt',
  USER_HABIT_PREFERENCES: '/api/v2/user/preferences/habit',
  USER_EXT_PREFERENCES: '/api/v2/user/preferences/ext',
  ATTACHMENT_QUOTA: '/api/v1/attachment/isUnderQuota',
  NOTIFICATIONS_UNREAD: '/api/v2/notification/unread',
  CALENDAR_ACCOUNTS: '/api/v2/calendar/third/accounts',
  CALENDAR_SUBSCRIPTIONS: '/api/v2/calendar/subscription',
  CALENDAR_EVENTS: '/api/v2/calendar/bind/events/all',
  USER_LIMITS: '/api/v2/configs/limits',
} as const;

export const COLLECTION_NAMES: readonly CollectionName[] = [
  'taskSet',
  'projectProfiles',
  'projectGroups',
  'tags',
  'filters',
  'orderMetadata',
  'remindChanges',
  'inboxId',
];

export const ENTITY_TYPES: readonly EntityType[] = [
  'task',
  'tag',
  'filter',
  'project',
  'projectGroup',
  'column',
  'habit',
  'habitCheckin',
];
