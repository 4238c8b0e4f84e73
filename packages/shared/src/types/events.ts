/**
 * Base interface for all mender events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

export type LoopPhase = 'AUDIT' | 'FIX' | 'JUDGE';

/**
 * Emitted when a control-loop run starts.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    /** Directory the workers operate on */
    target: string;
    resourceCount: number;
    maxIterations: number;
  };
}

export interface IterationStarted extends BaseEvent {
  type: 'IterationStarted';
  payload: {
    iteration: number;
    maxIterations: number;
  };
}

export interface PhaseStarted extends BaseEvent {
  type: 'PhaseStarted';
  payload: {
    iteration: number;
    phase: LoopPhase;
  };
}

/** Emitted when a phase completes, successfully or through a handled failure */
export interface PhaseFinished extends BaseEvent {
  type: 'PhaseFinished';
  payload: {
    iteration: number;
    phase: LoopPhase;
    durationMs: number;
    /** Phase-specific counts, e.g. issues or modified files */
    summary: Record<string, number | string | boolean>;
  };
}

/** Emitted by the auditor after normalizing one resource's response */
export interface AuditParsed extends BaseEvent {
  type: 'AuditParsed';
  payload: {
    resource: string;
    kind: 'structured' | 'fallback' | 'empty';
    status: 'OK' | 'PARTIAL';
    issueCount: number;
    remediated: boolean;
  };
}

/** Emitted when a worker throws or times out at a phase boundary */
export interface AdapterFailed extends BaseEvent {
  type: 'AdapterFailed';
  payload: {
    iteration: number;
    phase: LoopPhase;
    error: string;
    code?: string;
  };
}

export interface IterationFinished extends BaseEvent {
  type: 'IterationFinished';
  payload: {
    iteration: number;
    issues: number;
    filesModified: number;
    verdictStatus?: string;
    verdictAction?: string;
  };
}

/** Emitted when the detector or a fatal failure ends the loop */
export interface RunStopped extends BaseEvent {
  type: 'RunStopped';
  payload: {
    tag: string;
    reason: string;
    iteration: number;
  };
}

export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    tag: string;
    iterations: number;
    issuesFound: number;
    filesModified: number;
    durationMs: number;
  };
}

/**
 * Emitted when a provider API request starts.
 */
export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

/**
 * Emitted when a provider API request completes (success or failure).
 */
export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    /** Number of retry attempts made (0 = succeeded on first try) */
    retries: number;
  };
}

export type MenderEvent =
  | RunStarted
  | IterationStarted
  | PhaseStarted
  | PhaseFinished
  | AuditParsed
  | AdapterFailed
  | IterationFinished
  | RunStopped
  | RunFinished
  | ProviderRequestStarted
  | ProviderRequestFinished;

export type MenderEventType = MenderEvent['type'];

/**
 * Interface for publishing mender events.
 * Implementations can write to logs, send to external services, etc.
 */
export interface EventBus {
  /**
   * Emit an event to all registered listeners.
   * @param event - The event to emit
   */
  emit(event: MenderEvent): Promise<void> | void;
}
