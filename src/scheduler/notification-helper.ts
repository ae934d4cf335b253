/**
 * Notification dispatch helper for run completion events.
 */

import type { Logger } from 'pino';

import type { Notifier } from '../notify/slack.js';
import type { Run } from '../schemas/run.js';

/** Dispatch a notification for a finished run. Notifier errors are logged, not thrown. */
export async function dispatchNotification(
  run: Run,
  onSuccess: string | null,
  onFailure: string | null,
  notifier: Notifier,
  logger: Logger,
): Promise<void> {
  const durationMs = run.durationMs ?? 0;

  if (run.status === 'succeeded' && onSuccess) {
    await notifier
      .notifySuccess(run.pipelineName, durationMs, onSuccess)
      .catch((err: unknown) => {
        logger.error({ pipeline: run.pipelineName, err }, 'Success notification failed');
      });
  } else if (run.status === 'failed' && onFailure) {
    await notifier
      .notifyFailure(
        run.pipelineName,
        durationMs,
        run.error ?? null,
        onFailure,
        run.failedStage,
      )
      .catch((err: unknown) => {
        logger.error({ pipeline: run.pipelineName, err }, 'Failure notification failed');
      });
  }
}
