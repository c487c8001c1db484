/**
 * Pipeline event publisher.
 *
 * Persists run, stage and deployment events in the event store and delivers
 * them to in-process subscribers (the CLI progress printer, the HTTP event
 * feed, tests).
 */

import { v4 as uuid } from 'uuid';
import { PipelineRun } from '../domain/run';
import {
  EVENT_SCHEMA_VERSION,
  EventSubscription,
  PipelineEvent,
  PipelineEventType,
} from '../domain/events';
import { Store } from '../storage/store';
import { errorContext, logger } from '../logger';

const log = logger.child({ module: 'publisher' });

export class PipelineEventPublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private store: Store) {}

  /** Publish a run lifecycle event. */
  async publishRunEvent(run: PipelineRun, eventType: PipelineEventType): Promise<PipelineEvent> {
    return this.publish({
      type: eventType,
      runId: run.id,
      payload: {
        status: run.status,
        pipelineName: run.pipelineName,
        commitSha: run.commitSha,
        failure: run.failure,
        error: run.error,
      },
    });
  }

  /** Publish a stage lifecycle event. */
  async publishStageEvent(
    run: PipelineRun,
    stageId: string,
    eventType: PipelineEventType,
    extra: Record<string, unknown> = {},
  ): Promise<PipelineEvent> {
    const stage = run.stages[stageId];
    return this.publish({
      type: eventType,
      runId: run.id,
      stageId,
      payload: {
        stageType: stage?.type,
        stageStatus: stage?.status,
        attempts: stage?.attempts,
        durationMs: stage?.durationMs,
        error: stage?.error,
        skippedBecause: stage?.skippedBecause,
        ...extra,
      },
    });
  }

  /** Publish an event, filling in id, schema version and timestamp. */
  async publish(event: Omit<PipelineEvent, 'id' | 'schemaVersion' | 'timestamp'>): Promise<PipelineEvent> {
    const full: PipelineEvent = {
      id: `evt_${uuid()}`,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      ...event,
    };

    await this.store.events.create(full);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(full, sub)) continue;
      try {
        sub.callback(full);
      } catch (err) {
        log.warn('Event subscriber threw', { subscriptionId: sub.id, eventType: full.type, ...errorContext(err) });
      }
    }

    return full;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  async getEventsByRun(runId: string, eventTypes?: PipelineEventType[]): Promise<PipelineEvent[]> {
    return this.store.events.listByRun(runId, { eventTypes });
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}

/**
 * Anything that can report events. The deployment controller depends on
 * this rather than on the publisher so it can run without a store.
 */
export type EventSink = Pick<PipelineEventPublisher, 'publish'>;
