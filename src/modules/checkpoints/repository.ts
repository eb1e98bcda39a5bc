export interface CheckpointStore {
  /** Last fully processed line offset, or 0 when there is no checkpoint. */
  load(): Promise<number>;
  save(offset: number): Promise<void>;
  clear(): Promise<void>;

  // Exclusive for the duration of a run
  acquire(): Promise<void>;
  release(): Promise<void>;
}
