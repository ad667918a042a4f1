/**
 * Checkpoint storage
 */

import { CONSTANTS } from './constants';

/**
 * Holder of the last-seen sync checkpoint. One store belongs to one engine;
 * sharing a store between engines loses the serialisation the engine provides.
 */
export interface CheckpointStore {
  get(): number;
  set(checkpoint: number): void;
  /** Back to 0, so the next sync is a full one. */
  reset(): void;
}

export class MemoryCheckpointStore implements CheckpointStore {
  private checkpoint: number;

  constructor(initial: number = CONSTANTS.FULL_SYNC_CHECKPOINT) {
    this.checkpoint = initial;
  }

  get(): number {
    return this.checkpoint;
  }

  set(checkpoint: number): void {
    this.checkpoint = checkpoint;
  }

  reset(): void {
    this.checkpoint = CONSTANTS.FULL_SYNC_CHECKPOINT;
  }
}
