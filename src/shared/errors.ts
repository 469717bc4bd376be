export class EventboardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'EventboardError';
  }
}

export class ConfigError extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Per-source failure. Carried inside a failed SourceFetchResult, never thrown
 * across the per-source boundary.
 */
export class FetchError extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_ERROR', details);
    this.name = 'FetchError';
  }
}

export class SnapshotMissing extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SNAPSHOT_MISSING', details);
    this.name = 'SnapshotMissing';
  }
}

export class SnapshotCorrupt extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SNAPSHOT_CORRUPT', details);
    this.name = 'SnapshotCorrupt';
  }
}

export class SnapshotWriteError extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SNAPSHOT_WRITE_ERROR', details);
    this.name = 'SnapshotWriteError';
  }
}

export class PipelineError extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PIPELINE_ERROR', details);
    this.name = 'PipelineError';
  }
}

export class PipelineAborted extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PIPELINE_ABORTED', details);
    this.name = 'PipelineAborted';
  }
}

export class RunLockedError extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'RUN_LOCKED', details);
    this.name = 'RunLockedError';
  }
}

export class LlmError extends EventboardError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}
