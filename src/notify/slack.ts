/**
 * Slack notification module. Sends run success/failure messages via the Slack
 * Web API (chat.postMessage). Logs and returns if no token is configured.
 */

import { request } from 'node:https';

import type { Logger } from 'pino';
import { z } from 'zod';

/** Sends one message to a channel. */
export type PostMessage = (
  token: string,
  channel: string,
  text: string,
) => Promise<void>;

/** Notification configuration. */
export interface NotifyConfig {
  slackToken: string | null;
  logger: Logger;
  /** Transport override (defaults to chat.postMessage over HTTPS). */
  post?: PostMessage;
}

/** Notifier interface for run completion events. */
export interface Notifier {
  notifySuccess(
    pipelineName: string,
    durationMs: number,
    channel: string,
  ): Promise<void>;
  notifyFailure(
    pipelineName: string,
    durationMs: number,
    error: string | null,
    channel: string,
    failedStage?: string,
  ): Promise<void>;
}

const slackResponseSchema = z.object({
  ok: z.boolean(),
  error: z.string().optional(),
});

/** Post a message to Slack via chat.postMessage API. */
export const postToSlack: PostMessage = (token, channel, text) =>
  new Promise((resolve, reject) => {
    const payload = JSON.stringify({ channel, text });

    const req = request(
      'https://slack.com/api/chat.postMessage',
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${token}`,
          'Content-Length': Buffer.byteLength(payload),
        },
      },
      (res) => {
        let body = '';
        res.on('data', (chunk: Buffer) => {
          body += chunk.toString();
        });
        res.on('end', () => {
          if (res.statusCode !== 200) {
            reject(
              new Error(`Slack API returned ${String(res.statusCode)}: ${body}`),
            );
            return;
          }
          try {
            const parsed = slackResponseSchema.parse(JSON.parse(body));
            if (parsed.ok) resolve();
            else reject(new Error(`Slack API error: ${parsed.error ?? 'unknown'}`));
          } catch (err) {
            reject(err instanceof Error ? err : new Error(String(err)));
          }
        });
      },
    );

    req.on('error', reject);
    req.write(payload);
    req.end();
  });

const seconds = (durationMs: number): string => (durationMs / 1000).toFixed(1);

export function formatSuccess(pipelineName: string, durationMs: number): string {
  return `✅ *${pipelineName}* completed (${seconds(durationMs)}s)`;
}

export function formatFailure(
  pipelineName: string,
  durationMs: number,
  error: string | null,
  failedStage?: string,
): string {
  const stage = failedStage ? ` at stage \`${failedStage}\`` : '';
  const errorMsg = error ? `: ${error}` : '';
  return `⚠️ *${pipelineName}* failed${stage} (${seconds(durationMs)}s)${errorMsg}`;
}

/** Create a notifier that sends Slack messages for run events. */
export function createNotifier(config: NotifyConfig): Notifier {
  const { slackToken, logger } = config;
  const post = config.post ?? postToSlack;

  async function send(
    kind: 'success' | 'failure',
    pipelineName: string,
    channel: string,
    text: string,
  ): Promise<void> {
    if (!slackToken) {
      logger.warn(
        { pipeline: pipelineName, channel },
        `No Slack token configured, skipping ${kind} notification`,
      );
      return;
    }
    await post(slackToken, channel, text);
  }

  return {
    notifySuccess(pipelineName, durationMs, channel): Promise<void> {
      return send(
        'success',
        pipelineName,
        channel,
        formatSuccess(pipelineName, durationMs),
      );
    },

    notifyFailure(pipelineName, durationMs, error, channel, failedStage): Promise<void> {
      return send(
        'failure',
        pipelineName,
        channel,
        formatFailure(pipelineName, durationMs, error, failedStage),
      );
    },
  };
}
