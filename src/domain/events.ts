/**
 * Pipeline event domain model.
 *
 * The event stream is the engine's only side channel: every run, stage and
 * deployment transition is published as a versioned event.
 */

export const PIPELINE_EVENT_TYPES = [
  'run.created',
  'run.started',
  'run.succeeded',
  'run.failed',
  'run.cancelled',
  'stage.started',
  'stage.retrying',
  'stage.succeeded',
  'stage.failed',
  'stage.skipped',
  'stage.cancelled',
  'deployment.started',
  'deployment.succeeded',
  'deployment.rolled_back',
] as const;

export type PipelineEventType = (typeof PIPELINE_EVENT_TYPES)[number];

export function isPipelineEventType(value: string): value is PipelineEventType {
  return PIPELINE_EVENT_TYPES.some((t) => t === value);
}

export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId?: string;
  stageId?: string;
  targetId?: string;
  payload: Record<string, unknown>;
}

export interface EventSubscription {
  id: string;
  /** Only deliver events of this run. */
  runId?: string;
  eventTypes?: PipelineEventType[];
  callback: (event: PipelineEvent) => void;
}

export const EVENT_SCHEMA_VERSION = '1.0.0';
