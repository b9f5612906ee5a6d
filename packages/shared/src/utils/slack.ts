import { optionalEnv } from './env.js';
import { sleep, withRetry } from './retry.js';

export enum NotifyChannel {
  ERRORS = 'errors',
  PIPELINE = 'pipeline',
  OPS = 'ops',
}

export enum NotifyCategory {
  CYCLE_COMPLETED = 'cycle_completed',
  CYCLE_PARTIAL_FAILURE = 'cycle_partial_failure',
  CYCLE_FAILED = 'cycle_failed',
  CYCLE_CANCELLED = 'cycle_cancelled',
  SCHEDULER_FAILED = 'scheduler_failed',
}

const ROUTES: Record<NotifyCategory, { channel: NotifyChannel; color: string }> = {
  [NotifyCategory.CYCLE_COMPLETED]: { channel: NotifyChannel.PIPELINE, color: '#28a745' },
  [NotifyCategory.CYCLE_PARTIAL_FAILURE]: { channel: NotifyChannel.PIPELINE, color: '#ffc107' },
  [NotifyCategory.CYCLE_FAILED]: { channel: NotifyChannel.ERRORS, color: '#dc3545' },
  [NotifyCategory.CYCLE_CANCELLED]: { channel: NotifyChannel.OPS, color: '#17a2b8' },
  [NotifyCategory.SCHEDULER_FAILED]: { channel: NotifyChannel.ERRORS, color: '#dc3545' },
};

const WEBHOOK_ENV: Record<NotifyChannel, string> = {
  [NotifyChannel.ERRORS]: 'SLACK_WEBHOOK_ERRORS',
  [NotifyChannel.PIPELINE]: 'SLACK_WEBHOOK_PIPELINE',
  [NotifyChannel.OPS]: 'SLACK_WEBHOOK_OPS',
};

const TITLE_LIMIT = 150;
const MESSAGE_LIMIT = 2800;
const SECTION_LIMIT = 3000;
// Block Kit accepts at most 10 fields per section
const MAX_FIELDS = 10;

const MIN_SEND_INTERVAL_MS = 500;
const WEBHOOK_RETRIES = 3;
const WEBHOOK_RETRY_BASE_MS = 1000;

export interface NotifyOptions {
  category: NotifyCategory;
  title: string;
  message: string;
  /** Shown as labelled fields (cycleId, succeeded, failed, ...) */
  context?: Record<string, string>;
  /** Name, message and the top of the stack are appended to the message */
  error?: unknown;
}

type SlackText = { type: 'plain_text' | 'mrkdwn'; text: string; emoji?: boolean };
type SlackBlock =
  | { type: 'header'; text: SlackText }
  | { type: 'section'; text: SlackText }
  | { type: 'section'; fields: SlackText[] }
  | { type: 'context'; elements: SlackText[] };

export interface SlackPayload {
  attachments: Array<{ color: string; blocks: SlackBlock[] }>;
}

class WebhookResponseError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`Slack webhook returned ${status}: ${body}`);
    this.name = 'WebhookResponseError';
    this.status = status;
  }
}

const missingWebhookWarned = new Set<NotifyChannel>();
const lastSendTime: Partial<Record<NotifyChannel, number>> = {};
const sendQueues: Partial<Record<NotifyChannel, Promise<void>>> = {};

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? text.slice(0, maxLength - 3) + '...' : text;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const stack = (error.stack ?? '').split('\n').slice(0, 5).join('\n');
    return `*Error:* \`${error.name}: ${error.message}\`\n\`\`\`${stack}\`\`\``;
  }
  return `*Error:* \`${String(error)}\``;
}

/** Block Kit attachment for one notification. */
export function buildSlackPayload(options: NotifyOptions, environment: string, sentAt = new Date()): SlackPayload {
  let text = truncate(options.message, MESSAGE_LIMIT);
  if (options.error !== undefined && options.error !== null) {
    text = truncate(`${text}\n\n${describeError(options.error)}`, SECTION_LIMIT);
  }

  const blocks: SlackBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: truncate(options.title, TITLE_LIMIT), emoji: false } },
    { type: 'section', text: { type: 'mrkdwn', text: text || '_(no details)_' } },
  ];

  const fields = Object.entries(options.context ?? {})
    .slice(0, MAX_FIELDS)
    .map(([label, value]): SlackText => ({ type: 'mrkdwn', text: `*${label}*\n${value}` }));
  if (fields.length > 0) {
    blocks.push({ type: 'section', fields });
  }

  blocks.push({
    type: 'context',
    elements: [
      { type: 'mrkdwn', text: `*category:* ${options.category}` },
      { type: 'mrkdwn', text: `*env:* ${environment}` },
      { type: 'mrkdwn', text: `*time:* ${sentAt.toISOString()}` },
    ],
  });

  return { attachments: [{ color: ROUTES[options.category].color, blocks }] };
}

async function post(webhookUrl: string, payload: SlackPayload): Promise<void> {
  const response = await fetch(webhookUrl, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  });
  if (!response.ok) {
    throw new WebhookResponseError(response.status, await response.text());
  }
}

/**
 * Post a notification to the channel its category routes to.
 *
 * Channels come from SLACK_WEBHOOK_ERRORS, SLACK_WEBHOOK_PIPELINE and
 * SLACK_WEBHOOK_OPS; an unset one is skipped with a single warning. Sends are
 * serialized per channel at least 500ms apart and 5xx responses are retried.
 * The returned promise never rejects.
 */
export function notify(options: NotifyOptions): Promise<void> {
  const { channel } = ROUTES[options.category];
  const envVar = WEBHOOK_ENV[channel];
  const webhookUrl = optionalEnv(envVar, '');

  if (!webhookUrl) {
    if (!missingWebhookWarned.has(channel)) {
      missingWebhookWarned.add(channel);
      console.warn(`[slack] ${envVar} not configured — ${channel} channel notifications will be skipped`);
    }
    return Promise.resolve();
  }

  const payload = buildSlackPayload(options, optionalEnv('ENVIRONMENT', 'unknown'));
  const previous = sendQueues[channel] ?? Promise.resolve();
  const next = previous.then(async () => {
    const elapsed = Date.now() - (lastSendTime[channel] ?? 0);
    if (elapsed < MIN_SEND_INTERVAL_MS) {
      await sleep(MIN_SEND_INTERVAL_MS - elapsed);
    }
    lastSendTime[channel] = Date.now();

    try {
      await withRetry(() => post(webhookUrl, payload), {
        maxRetries: WEBHOOK_RETRIES,
        baseDelayMs: WEBHOOK_RETRY_BASE_MS,
        jitterMs: 0,
        isRetryable: (error) => error instanceof WebhookResponseError && error.status >= 500,
      });
    } catch (error) {
      console.error('[slack] Failed to send notification', {
        category: options.category,
        title: options.title,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  sendQueues[channel] = next;
  return next;
}

/** Elapsed time as "45s", "2m 30s" or "2h 15m". */
export function formatDuration(startedAt: Date, completedAt: Date): string {
  const seconds = Math.floor((completedAt.getTime() - startedAt.getTime()) / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ${seconds % 60}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

/** Reset internal state (for testing only) */
export function _resetSlackState(): void {
  missingWebhookWarned.clear();
  for (const channel of Object.values(NotifyChannel)) {
    delete lastSendTime[channel];
    delete sendQueues[channel];
  }
}
