/**
 * TickTick batch-sync client
 */

export { TickTickClient } from './client';
export type { TickTickClientOptions } from './client';
export { ApiClient, isEmptyBody } from './http';
export type { ApiClientOptions, ApiResponse, RequestOptions } from './http';
export { MemoryCheckpointStore } from './checkpointStore';
export type { CheckpointStore } from './checkpointStore';
export { SyncProtocolClient, parseSnapshot, syncResponseSchema } from './syncProtocol';
export { ReconciliationEngine, changedItems, collectionItems, completeSnapshot } from './reconciliation';
export {
  BatchWriteCoordinator,
  WRITE_POLICIES,
  extractRecords,
  foldTagName,
  generateObjectId,
} from './batchWriter';
export type { BatchWriteCoordinatorOptions, RefetchPlan, ResponseShape, WritePolicy } from './batchWriter';
export { DatabaseManager } from './database';
export type { ApplyResult, CollectionSummary } from './database';
export { SyncRunner } from './runner';
export type { SyncRunnerOptions } from './runner';
export { getConfig, displayConfig } from './config';
export { CONSTANTS, ENDPOINTS, COLLECTION_NAMES, ENTITY_TYPES } from './constants';
export * from './errors';
export * from './models';
export * from './types';
export { TaskManager } from './managers/task';
export type { CompletedQuery, CreateTaskOptions, SubtaskInput, TaskFields, TaskKey } from './managers/task';
export { ProjectManager } from './managers/project';
export type { CreateProjectOptions } from './managers/project';
export { TagManager } from './managers/tag';
export type { CreateTagOptions } from './managers/tag';
export { FilterManager } from './managers/filter';
export type { CreateFilterOptions, FilterCondition, FilterRule, FilterRuleOptions } from './managers/filter';
export { HabitManager } from './managers/habit';
export type { CheckinOptions, CreateHabitOptions } from './managers/habit';
export { ColumnManager } from './managers/column';
export { SearchManager } from './managers/search';
export type { TaskCriteria } from './managers/search';
export { UserManager } from './managers/user';
export type { SyncContext } from './managers/context';
