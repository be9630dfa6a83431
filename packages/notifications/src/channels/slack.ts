/**
 * Slack Channel - Incoming Webhooks
 *
 * Messages are built from Block Kit helpers and posted to the webhook in
 * SLACK_PIPELINE_ALERTS_WEBHOOK_URL. Without a webhook, sends are skipped
 * and reported as successful.
 */

import { createLogger } from '@dealcheck/logger';

const log = createLogger('notifications').child('slack');

// =============================================================================
// Types
// =============================================================================

export interface SlackResult {
  success: boolean;
  skipped?: boolean;
  error?: string;
  /** HTTP attempts made, 0 when skipped */
  attempts?: number;
}

interface SlackTextObject {
  type: 'mrkdwn' | 'plain_text';
  text: string;
  emoji?: boolean;
}

export interface SlackSectionBlock {
  type: 'section';
  text?: SlackTextObject;
  fields?: SlackTextObject[];
}

export interface SlackHeaderBlock {
  type: 'header';
  text: SlackTextObject & { type: 'plain_text' };
}

export interface SlackDividerBlock {
  type: 'divider';
}

export interface SlackContextBlock {
  type: 'context';
  elements: SlackTextObject[];
}

export interface SlackButtonElement {
  type: 'button';
  text: SlackTextObject & { type: 'plain_text' };
  url: string;
  style?: 'primary' | 'danger';
  action_id: string;
}

export interface SlackActionsBlock {
  type: 'actions';
  elements: SlackButtonElement[];
}

export type SlackBlock = SlackSectionBlock | SlackHeaderBlock | SlackDividerBlock | SlackContextBlock | SlackActionsBlock;

export interface SlackMessage {
  /** Fallback shown in push notifications */
  text: string;
  blocks?: SlackBlock[];
}

// =============================================================================
// Configuration
// =============================================================================

export interface SlackConfig {
  pipelineAlertsWebhookUrl?: string;
  dashboardUrl?: string;
}

/**
 * Read at call time so long-lived processes see env changes.
 */
export function getSlackConfig(env: NodeJS.ProcessEnv = process.env): SlackConfig {
  return {
    pipelineAlertsWebhookUrl: env.SLACK_PIPELINE_ALERTS_WEBHOOK_URL || undefined,
    dashboardUrl: env.DASHBOARD_URL?.replace(/\/+$/, '') || undefined,
  };
}

export interface SlackSendOptions {
  webhookUrl?: string;
  timeoutMs?: number;
  /** Extra attempts after a 429 or 5xx answer */
  retries?: number;
  fetchImpl?: typeof fetch;
}

export const DEFAULT_SLACK_TIMEOUT_MS = 10_000;

// Block Kit limits
const HEADER_MAX = 150;
const TEXT_MAX = 3000;
const FIELD_MAX = 2000;
const MAX_FIELDS = 10;
const LOGGED_BODY_MAX = 200;

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 1)}…`;
}

function isRetryable(status: number): boolean {
  return status === 429 || status >= 500;
}

// =============================================================================
// Delivery
// =============================================================================

export async function sendSlackMessage(message: SlackMessage, options: SlackSendOptions = {}): Promise<SlackResult> {
  const url = options.webhookUrl ?? getSlackConfig().pipelineAlertsWebhookUrl;
  if (!url) {
    log.debug('SLACK_SKIPPED', { reason: 'webhook not configured' });
    return { success: true, skipped: true, attempts: 0 };
  }

  const fetchImpl = options.fetchImpl ?? fetch;
  const maxAttempts = 1 + (options.retries ?? 1);
  const body = JSON.stringify({ ...message, text: truncate(message.text, TEXT_MAX) });
  let lastError = 'Unknown error';
  let attempts = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    attempts = attempt;
    try {
      const response = await fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body,
        signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_SLACK_TIMEOUT_MS),
      });

      if (response.ok) {
        log.info('SLACK_SENT', { text: message.text, attempt });
        return { success: true, attempts: attempt };
      }

      lastError = `HTTP ${response.status}: ${truncate(await response.text(), LOGGED_BODY_MAX)}`;
      if (!isRetryable(response.status)) break;
      log.warn('SLACK_RETRYING', { status: response.status, attempt });
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
      log.warn('SLACK_RETRYING', { reason: lastError, attempt }, error);
    }
  }

  log.error('SLACK_SEND_FAILED', { reason: lastError });
  return { success: false, error: lastError, attempts };
}

// =============================================================================
// Block Kit helpers
// =============================================================================

export function slackHeader(text: string): SlackHeaderBlock {
  return { type: 'header', text: { type: 'plain_text', text: truncate(text, HEADER_MAX), emoji: true } };
}

export function slackText(text: string): SlackSectionBlock {
  return { type: 'section', text: { type: 'mrkdwn', text: truncate(text, TEXT_MAX) } };
}

export function slackDivider(): SlackDividerBlock {
  return { type: 'divider' };
}

export function slackContext(...texts: string[]): SlackContextBlock {
  return { type: 'context', elements: texts.map((text) => ({ type: 'mrkdwn', text: truncate(text, TEXT_MAX) })) };
}

export function slackActions(...buttons: SlackButtonElement[]): SlackActionsBlock {
  return { type: 'actions', elements: buttons };
}

export function slackButton(text: string, url: string, style?: 'primary' | 'danger'): SlackButtonElement {
  return {
    type: 'button',
    text: { type: 'plain_text', text, emoji: true },
    url,
    ...(style ? { style } : {}),
    action_id: `button_${text.toLowerCase().replace(/\W+/g, '_')}`,
  };
}

/**
 * Two-column field layout. Slack renders at most ten fields per section;
 * the rest are dropped.
 */
export function slackFieldsSection(fields: Record<string, string>): SlackSectionBlock {
  return {
    type: 'section',
    fields: Object.entries(fields)
      .slice(0, MAX_FIELDS)
      .map(([label, value]) => ({ type: 'mrkdwn', text: truncate(`*${label}:*\n${value}`, FIELD_MAX) })),
  };
}
