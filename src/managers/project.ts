/**
 * Projects (lists) and project groups (folders)
 */

import { extractRecords, generateObjectId } from '../batchWriter';
import { ENDPOINTS } from '../constants';
import { SyncClientError } from '../errors';
import { ProjectGroupModel, ProjectModel } from '../models';
import { collectionItems } from '../reconciliation';
import type { Project, ProjectGroup, WireRecord } from '../types';
import { writtenRecord } from './context';
import type { SyncContext } from './context';

export interface CreateProjectOptions {
  /** Hex color, e.g. "#FF5733" */
  color?: string;
  viewMode?: 'list' | 'kanban' | 'timeline';
  kind?: 'TASK' | 'NOTE';
  groupId?: string;
  sortOrder?: number;
}

export class ProjectManager {
  constructor(private ctx: SyncContext) {}

  async getAll(): Promise<Project[]> {
    const resolved = await this.ctx.engine.resolve('projectProfiles', true);
    return collectionItems(resolved).map(ProjectModel.fromWire);
  }

  async get(projectId: string): Promise<Project> {
    const projects = await this.getAll();
    const project = projects.find(p => p.id === projectId);
    if (!project) {
      throw new SyncClientError(`Project ${projectId} not found`, 'NOT_FOUND');
    }
    return project;
  }

  async getGroups(): Promise<ProjectGroup[]> {
    const resolved = await this.ctx.engine.resolve('projectGroups', true);
    return collectionItems(resolved).map(ProjectGroupModel.fromWire);
  }

  async create(name: string, options: CreateProjectOptions = {}): Promise<Project> {
    const id = generateObjectId();
    const payload: WireRecord = {
      id,
      name,
      sortOrder: options.sortOrder ?? 0,
      viewMode: options.viewMode ?? 'list',
      kind: options.kind ?? 'TASK',
    };
    if (options.color) payload.color = options.color;
    if (options.groupId) payload.groupId = options.groupId;

    const result = await this.ctx.writer.submit('project', [payload]);
    return ProjectModel.fromWire(writtenRecord(result, id));
  }

  async update(project: Project): Promise<Project> {
    const result = await this.ctx.writer.submit('project', [], [ProjectModel.toWire(project)]);
    return ProjectModel.fromWire(writtenRecord(result, project.id));
  }

  async rename(projectId: string, name: string): Promise<Project> {
    const project = await this.get(projectId);
    return this.update({ ...project, name });
  }

  /**
   * Delete a project together with its tasks
   */
  async delete(projectId: string): Promise<void> {
    await this.ctx.writer.submit('project', [], [], [projectId]);
  }

  async archive(projectId: string): Promise<Project> {
    const project = await this.get(projectId);
    return this.update({ ...project, closed: true });
  }

  async unarchive(projectId: string): Promise<Project> {
    const project = await this.get(projectId);
    return this.update({ ...project, closed: false });
  }

  /**
   * Templates offered by the service
   */
  async getTemplates(): Promise<WireRecord[]> {
    const response = await this.ctx.http.get(ENDPOINTS.TEMPLATES);
    return response.empty ? [] : extractRecords(response.data);
  }

  /**
   * The user's own project templates, optionally only those changed after `timestamp`
   */
  async getProjectTemplates(timestamp: number = 0): Promise<WireRecord[]> {
    const response = await this.ctx.http.get(ENDPOINTS.PROJECT_TEMPLATES, { params: { timestamp } });
    return response.empty ? [] : extractRecords(response.data);
  }

  // ── Groups ────────────────────────────────────────────────────────

  async createGroup(name: string, sortOrder: number = 0): Promise<ProjectGroup> {
    const id = generateObjectId();
    const result = await this.ctx.writer.submit('projectGroup', [{ id, name, sortOrder, listType: 'group' }]);
    return ProjectGroupModel.fromWire(writtenRecord(result, id));
  }

  async updateGroup(group: ProjectGroup): Promise<ProjectGroup> {
    const result = await this.ctx.writer.submit('projectGroup', [], [ProjectGroupModel.toWire(group)]);
    return ProjectGroupModel.fromWire(writtenRecord(result, group.id));
  }

  async deleteGroup(groupId: string): Promise<void> {
    await this.ctx.writer.submit('projectGroup', [], [], [groupId]);
  }

  /**
   * Move a project into a group, or out of any group with null
   */
  async moveToGroup(projectId: string, groupId: string | null): Promise<Project> {
    const project = await this.get(projectId);
    return this.update({ ...project, groupId });
  }
}
