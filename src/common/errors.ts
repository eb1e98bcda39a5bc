export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProcessingIoError extends AppError {
  constructor(message: string, cause: unknown) {
    super("PROCESSING_IO", message, { cause });
  }
}

export class CorruptCheckpointError extends AppError {
  constructor(path: string, content: string) {
    super("CORRUPT_CHECKPOINT", `Checkpoint ${path} does not hold a line offset: "${content}"`);
  }
}

export class CheckpointLockedError extends AppError {
  constructor(lockPath: string, holderPid?: number) {
    super(
      "CHECKPOINT_LOCKED",
      holderPid === undefined
        ? `Checkpoint is locked by another run (${lockPath})`
        : `Checkpoint is locked by process ${holderPid} (${lockPath})`
    );
  }
}

export class InvalidPointsError extends AppError {
  constructor(message = "Points must be a non-negative integer") {
    super("INVALID_POINTS", message);
  }
}
