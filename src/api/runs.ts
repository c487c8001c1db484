/**
 * Run API routes.
 *
 * POST /runs: Validate a spec and start a run (executes asynchronously)
 * GET /runs: List runs, most recent first
 * GET /runs/:runId: Run status with per-stage detail
 * GET /runs/:runId/events: Event stream of a run
 * POST /runs/:runId/cancel: Cancel a run
 */

import { Router } from 'express';
import { PipelineSpec } from '../domain/pipeline';
import { RunStatus } from '../domain/run';
import { PipelineEventType, isPipelineEventType } from '../domain/events';
import { parsePipelineSpec } from '../dsl/validator';
import { parsePipelineSpecText } from '../dsl/loader';
import { PipelineEventPublisher } from '../data-plane/publisher';
import { PipelineExecutor } from '../engine/executor';
import { asyncHandler, requestError } from './middleware';

const RUN_STATUSES: readonly string[] = Object.values(RunStatus);

function parseSpecBody(value: unknown): PipelineSpec {
  if (typeof value === 'string') return parsePipelineSpecText(value, 'request body');
  return parsePipelineSpec(value);
}

function toRunStatus(value: unknown): RunStatus | undefined {
  if (typeof value !== 'string' || value === '') return undefined;
  const status = Object.values(RunStatus).find((s) => s === value);
  if (!status) throw requestError(`status must be one of ${RUN_STATUSES.join(', ')}`, { status: value });
  return status;
}

function toInt(value: unknown, fallback: number, min: number, max: number): number {
  if (typeof value !== 'string') return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min) return fallback;
  return Math.min(parsed, max);
}

export function createRunRoutes(executor: PipelineExecutor, publisher: PipelineEventPublisher): Router {
  const router = Router();

  router.post(
    '/runs',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      if (typeof body !== 'object' || body === null) {
        throw requestError('Request body must be an object with "spec" and "commitSha"');
      }
      const commitSha = 'commitSha' in body ? body.commitSha : undefined;
      if (typeof commitSha !== 'string') {
        throw requestError('"commitSha" is required');
      }
      const concurrency = 'concurrency' in body ? body.concurrency : undefined;
      if (concurrency !== undefined && typeof concurrency !== 'number') {
        throw requestError('"concurrency" must be a number');
      }
      if (!('spec' in body)) {
        throw requestError('"spec" is required');
      }

      const run = await executor.startRun({
        spec: parseSpecBody(body.spec),
        commitSha,
        ...(concurrency !== undefined ? { concurrency } : {}),
      });
      res.status(201).json({ run });
    }),
  );

  router.get(
    '/runs',
    asyncHandler(async (req, res) => {
      const status = toRunStatus(req.query.status);
      const result = await executor.listRuns({
        limit: toInt(req.query.limit, 100, 1, 1000),
        offset: toInt(req.query.offset, 0, 0, Number.MAX_SAFE_INTEGER),
        ...(status ? { status } : {}),
      });
      res.json(result);
    }),
  );

  router.get(
    '/runs/:runId',
    asyncHandler(async (req, res) => {
      const run = await executor.getRun(req.params.runId);
      res.json({ run });
    }),
  );

  router.get(
    '/runs/:runId/events',
    asyncHandler(async (req, res) => {
      await executor.getRun(req.params.runId);
      let eventTypes: PipelineEventType[] | undefined;
      if (typeof req.query.types === 'string' && req.query.types !== '') {
        eventTypes = req.query.types.split(',').filter(isPipelineEventType);
      }
      const events = await publisher.getEventsByRun(req.params.runId, eventTypes);
      res.json({ events, total: events.length });
    }),
  );

  router.post(
    '/runs/:runId/cancel',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      const reason =
        typeof body === 'object' && body !== null && 'reason' in body && typeof body.reason === 'string'
          ? body.reason
          : undefined;
      const header = req.header('x-identity-id');
      const run = await executor.cancelRun(req.params.runId, header && header !== '' ? header : 'api', reason);
      res.json({ run });
    }),
  );

  return router;
}
