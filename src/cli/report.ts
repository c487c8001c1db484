/**
 * Human-readable run reports and exit codes.
 */

import { PipelineError, SpecError } from '../domain/errors';
import { PipelineEvent } from '../domain/events';
import { PipelineRun, RunStatus, StageInstance, StageStatus } from '../domain/run';

export const EXIT_SUCCESS = 0;
/** A stage failed or the run was cancelled. */
export const EXIT_FAILURE = 1;
export const EXIT_SPEC_ERROR = 2;

export function exitCodeForRun(run: Pick<PipelineRun, 'status'>): number {
  return run.status === RunStatus.Failed || run.status === RunStatus.Cancelled ? EXIT_FAILURE : EXIT_SUCCESS;
}

export function exitCodeForError(err: unknown): number {
  if (err instanceof SpecError) return EXIT_SPEC_ERROR;
  if (err instanceof PipelineError && err.code.startsWith('SPEC.')) return EXIT_SPEC_ERROR;
  return EXIT_FAILURE;
}

function stageDetail(stage: StageInstance): string {
  switch (stage.status) {
    case StageStatus.Succeeded:
      return `attempts=${stage.attempts} duration=${stage.durationMs ?? 0}ms`;
    case StageStatus.Failed:
      return stage.error ? `${stage.error.code}: ${stage.error.message}` : 'failed';
    case StageStatus.Skipped:
      return stage.skippedBecause ? `because "${stage.skippedBecause}" failed` : '';
    default:
      return '';
  }
}

/** Status report: every stage, the first failure and what it skipped. */
export function formatRunReport(run: PipelineRun): string[] {
  const lines = [`Run ${run.id} (${run.pipelineName} @ ${run.commitSha.slice(0, 12)}): ${run.status}`];
  const width = Math.max(...run.executionOrder.map((id) => id.length));

  for (const stageId of run.executionOrder) {
    const stage = run.stages[stageId];
    if (!stage) continue;
    const detail = stageDetail(stage);
    lines.push(`  ${stageId.padEnd(width)}  ${stage.status.padEnd(9)}${detail ? `  ${detail}` : ''}`.trimEnd());
  }

  if (run.failure) {
    lines.push(`First failure: ${run.failure.stageId} [${run.failure.code}] ${run.failure.message}`);
    if (run.failure.skipped.length > 0) {
      lines.push(`Skipped: ${run.failure.skipped.join(', ')}`);
    }
  }
  if (run.status === RunStatus.Cancelled) {
    lines.push(`Cancelled by ${run.cancelledBy ?? 'unknown'}${run.cancelReason ? `: ${run.cancelReason}` : ''}`);
  }
  return lines;
}

/** One progress line per event. */
export function formatEvent(event: PipelineEvent): string {
  const subject = event.stageId ?? event.targetId ?? event.runId ?? '';
  const attempt = typeof event.payload.attempt === 'number' ? ` attempt=${event.payload.attempt}` : '';
  return `${event.type.padEnd(22)} ${subject}${attempt}`.trimEnd();
}
