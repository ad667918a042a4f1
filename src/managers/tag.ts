/**
 * Tags and "parent/child" sub-tags
 */

import { extractRecords, foldTagName } from '../batchWriter';
import { CONSTANTS, ENDPOINTS } from '../constants';
import { TagModel, TaskModel } from '../models';
import { collectionItems } from '../reconciliation';
import type { Tag, Task, WireRecord } from '../types';
import { writtenRecord } from './context';
import type { SyncContext } from './context';

export interface CreateTagOptions {
  /** Display label; defaults to the name as given */
  label?: string;
  color?: string;
  sortOrder?: number;
  sortType?: string;
  /** Parent tag name, used when `name` has no separator of its own */
  parent?: string;
}

export class TagManager {
  constructor(private ctx: SyncContext) {}

  async getAll(): Promise<Tag[]> {
    const resolved = await this.ctx.engine.resolve('tags', true);
    return collectionItems(resolved).map(TagModel.fromWire);
  }

  async get(name: string): Promise<Tag | undefined> {
    const wanted = foldTagName(name);
    const tags = await this.getAll();
    return tags.find(tag => tag.name === wanted);
  }

  async getChildren(parent: string): Promise<Tag[]> {
    const wanted = foldTagName(parent);
    const tags = await this.getAll();
    return tags.filter(tag => tag.parent === wanted);
  }

  async create(name: string, options: CreateTagOptions = {}): Promise<Tag> {
    const fullName =
      options.parent && !name.includes(CONSTANTS.TAG_SEPARATOR)
        ? `${options.parent}${CONSTANTS.TAG_SEPARATOR}${name}`
        : name;

    const payload: WireRecord = {
      name: fullName,
      label: options.label || fullName,
      sortOrder: options.sortOrder ?? 0,
      color: options.color ?? '',
    };
    if (options.sortType) payload.sortType = options.sortType;

    const result = await this.ctx.writer.submit('tag', [payload]);
    return TagModel.fromWire(writtenRecord(result, foldTagName(fullName)));
  }

  createSubtag(parent: string, child: string, options: Omit<CreateTagOptions, 'parent'> = {}): Promise<Tag> {
    return this.create(`${parent}${CONSTANTS.TAG_SEPARATOR}${child}`, options);
  }

  async update(tag: Tag): Promise<Tag> {
    const result = await this.ctx.writer.submit('tag', [], [TagModel.toWire(tag)]);
    return TagModel.fromWire(writtenRecord(result, tag.name));
  }

  /**
   * Rename a tag everywhere it is used
   */
  async rename(oldName: string, newName: string): Promise<void> {
    await this.ctx.http.put(ENDPOINTS.TAG_RENAME, {
      data: { name: foldTagName(oldName), newName: foldTagName(newName) },
    });
  }

  /**
   * Delete a tag and remove it from every task. Sub-tag names are valid keys here too.
   */
  async delete(name: string): Promise<void> {
    await this.ctx.writer.submit('tag', [], [], [name]);
  }

  async getCompletedTasks(tagNames: string[], limit: number = 50, token: string = ''): Promise<Task[]> {
    const response = await this.ctx.http.post(ENDPOINTS.TAG_COMPLETED_TASKS, {
      data: { tags: tagNames.map(foldTagName), token, limit },
    });
    if (response.empty) return [];
    return extractRecords(response.data).map(TaskModel.fromWire);
  }
}
