import { CheckpointLockedError } from "../../common/errors";
import { CheckpointStore } from "../../modules/checkpoints/repository";

export class MemoryCheckpointStore implements CheckpointStore {
  private offset: number | null;
  private locked = false;
  readonly saved: number[] = [];

  constructor(initialOffset: number | null = null) {
    this.offset = initialOffset;
  }

  get current(): number | null {
    return this.offset;
  }

  async load(): Promise<number> {
    return this.offset ?? 0;
  }

  async save(offset: number): Promise<void> {
    this.offset = offset;
    this.saved.push(offset);
  }

  async clear(): Promise<void> {
    this.offset = null;
  }

  async acquire(): Promise<void> {
    if (this.locked) {
      throw new CheckpointLockedError("memory");
    }
    this.locked = true;
  }

  async release(): Promise<void> {
    this.locked = false;
  }
}
