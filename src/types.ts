/**
 * Type definitions for the sync client
 */

/**
 * Opaque JSON record as it travels on the wire. The engine never looks inside
 * these beyond the keys named in the write policy table.
 */
export type WireRecord = Record<string, unknown>;

/**
 * Delete keys are either key records (`{ taskId, projectId }`) or bare ids/names.
 */
export type DeleteKey = WireRecord | string;

export type AuthMode = 'session' | 'apiToken';

// ── Sync snapshot ──────────────────────────────────────────────────

export type CollectionName =
  | 'taskSet'
  | 'projectProfiles'
  | 'projectGroups'
  | 'tags'
  | 'filters'
  | 'orderMetadata'
  | 'remindChanges'
  | 'inboxId';

export interface TaskSetPayload {
  update: WireRecord[];
  add: WireRecord[];
  delete: WireRecord[];
  tagUpdate: WireRecord[];
  empty: boolean;
}

export interface CollectionPayloads {
  taskSet: TaskSetPayload;
  projectProfiles: WireRecord[];
  projectGroups: WireRecord[];
  tags: WireRecord[];
  filters: WireRecord[];
  orderMetadata: WireRecord;
  remindChanges: WireRecord[];
  inboxId: string;
}

/**
 * Per-collection state of a snapshot. `absent` only ever comes out of a delta
 * sync and means "unchanged since the previous checkpoint".
 */
export type CollectionState<T> =
  | { kind: 'absent' }
  | { kind: 'empty'; payload: T }
  | { kind: 'present'; payload: T };

export type SnapshotCollections = {
  [K in CollectionName]: CollectionState<CollectionPayloads[K]>;
};

export type SyncMode = 'full' | 'delta';

export interface Snapshot {
  checkpoint: number;
  /** Checkpoint the request was issued against. */
  requestedFrom: number;
  mode: SyncMode;
  collections: SnapshotCollections;
}

export interface ResolvedCollection<K extends CollectionName> {
  collection: K;
  /** True only when the state came from a full sync and can be read as the complete list. */
  authoritative: boolean;
  checkpoint: number;
  state: CollectionState<CollectionPayloads[K]>;
}

// ── Batch writes ───────────────────────────────────────────────────

export type EntityType =
  | 'task'
  | 'tag'
  | 'filter'
  | 'project'
  | 'projectGroup'
  | 'column'
  | 'habit'
  | 'habitCheckin';

export interface BatchWriteRequest {
  add: WireRecord[];
  update: WireRecord[];
  delete: DeleteKey[];
}

export type WriteState =
  | 'built'
  | 'submitted'
  | 'materialized'
  | 'requires_refetch'
  | 'rejected'
  | 'failed';

export interface BatchWriteResult {
  entityType: EntityType;
  outcome: 'materialized';
  /** Materialised records for everything added or updated, in request order where the server allows. */
  records: WireRecord[];
  /** True when the records came from the follow-up read instead of the write response. */
  refetched: boolean;
  etags: Record<string, string>;
  errors: Record<string, unknown>;
}

// ── Domain records ─────────────────────────────────────────────────

export enum TaskStatus {
  OPEN = 0,
  COMPLETED = 2,
}

export enum Priority {
  NONE = 0,
  LOW = 1,
  MEDIUM = 3,
  HIGH = 5,
}

export interface Subtask {
  id: string;
  title: string;
  status: number;
  sortOrder: number;
  startDate?: Date;
  isAllDay: boolean;
  timeZone: string;
  completedTime?: Date;
}

export interface Reminder {
  id: string;
  /** iCal TRIGGER, e.g. "TRIGGER:P0DT9H0M0S" */
  trigger: string;
}

export interface Task {
  id: string;
  projectId: string;
  title: string;
  content: string;
  desc: string;
  priority: number;
  status: number;
  tags: string[];
  items: Subtask[];
  reminders: Reminder[];
  startDate?: Date;
  dueDate?: Date;
  isAllDay: boolean;
  isFloating: boolean;
  timeZone: string;
  repeatFlag: string;
  repeatFrom: string;
  sortOrder: number;
  progress: number;
  kind: string;
  parentId: string;
  columnId: string;
  etag: string;
  deleted: number;
  createdTime?: Date;
  modifiedTime?: Date;
  creator: number;
  commentCount: number;
  attachments: WireRecord[];
  childIds: string[];
}

export interface SortOption {
  groupBy: string;
  orderBy: string;
  order: string | null;
}

export interface Project {
  id: string;
  name: string;
  isOwner: boolean;
  color: string | null;
  sortOrder: number;
  sortType: string;
  sortOption: SortOption;
  userCount: number;
  etag: string;
  modifiedTime?: Date;
  inAll: boolean;
  showType: number;
  muted: boolean;
  closed: boolean | null;
  groupId: string | null;
  viewMode: string;
  kind: string;
  teamId: string | null;
  source: number;
  background: string | null;
}

export interface ProjectGroup {
  id: string;
  name: string;
  showAll: boolean;
  sortOrder: number;
  viewMode: string | null;
  sortType: string | null;
  etag: string;
}

export interface Tag {
  name: string;
  rawName: string;
  label: string;
  sortOrder: number;
  sortType: string;
  color: string;
  etag: string;
  type: number;
  /** Parent tag name for sub-tags ("parent/child"), empty for top-level tags. */
  parent: string;
  sortOption: SortOption;
}

export interface Filter {
  id: string;
  name: string;
  /** JSON-encoded rule */
  rule: string;
  sortOrder: number;
  sortType: string;
  viewMode: string;
  etag: string;
  createdTime?: Date;
  modifiedTime?: Date;
  sortOption: SortOption;
}

export interface Habit {
  id: string;
  name: string;
  iconRes: string;
  color: string;
  sortOrder: number;
  /** 0 active, 1 archived, 2 deleted */
  status: number;
  encouragement: string;
  totalCheckIns: number;
  type: 'Boolean' | 'Real' | string;
  goal: number;
  step: number;
  unit: string;
  repeatRule: string;
  reminders: Array<string | WireRecord>;
  recordEnable: boolean;
  sectionId: string;
  targetDays: number;
  /** yyyyMMdd */
  targetStartDate: number;
  completedCycles: number;
  createdTime?: Date;
  modifiedTime?: Date;
  archivedTime?: Date;
  etag: string;
}

export interface HabitCheckin {
  id: string;
  habitId: string;
  status: number;
  value: number;
  /** yyyyMMdd */
  checkinStamp: string;
  checkinTime?: Date;
  goal: number;
  etag: string;
}

export interface Column {
  id: string;
  projectId: string;
  name: string;
  sortOrder: number;
  etag: string;
}

// ── Runner / persistence ───────────────────────────────────────────

export interface SyncLog {
  id?: number;
  timestamp: string;
  operation: string;
  mode?: SyncMode;
  checkpoint?: number;
  details?: string;
  status: 'success' | 'error' | 'warning';
  errorMessage?: string;
}

export interface Config {
  token: string;
  baseUrl: string;
  authMode: AuthMode;
  databasePath: string;
  syncInterval: number;
  requestTimeoutMs: number;
}
