/**
 * Pipeline Run Alerts
 *
 * Sent when an ingestion run finishes FAILED, and when the first
 * successful run follows a failed one.
 */

import {
  sendSlackMessage,
  slackHeader,
  slackDivider,
  slackContext,
  slackActions,
  slackButton,
  slackFieldsSection,
  getSlackConfig,
  type SlackBlock,
  type SlackResult,
  type SlackSendOptions,
} from '../channels/slack';

// =============================================================================
// Types
// =============================================================================

export interface PipelineRunAlertInfo {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  totalOffers: number;
  totalOfferErrors: number;
  errorMessage?: string | null;
  /** Retailer domains whose source failed or returned nothing */
  failedSources: Array<{ domain: string; error: string | null }>;
}

function durationText(run: PipelineRunAlertInfo): string {
  const seconds = Math.round((run.finishedAt.getTime() - run.startedAt.getTime()) / 1000);
  return `${seconds}s`;
}

function statusButton(): SlackBlock[] {
  const { dashboardUrl } = getSlackConfig();
  return dashboardUrl ? [slackActions(slackButton('View Run Status', `${dashboardUrl}/status`, 'danger'))] : [];
}

// =============================================================================
// Run Failed Notification
// =============================================================================

export async function notifyPipelineRunFailed(
  run: PipelineRunAlertInfo,
  options?: SlackSendOptions
): Promise<SlackResult> {
  const sources = run.failedSources.length > 0
    ? run.failedSources.map(s => `${s.domain}${s.error ? ` (${s.error.slice(0, 80)})` : ''}`).join(', ')
    : 'none';

  return sendSlackMessage({
    text: `⚠️ Pipeline run failed: ${run.errorMessage ?? 'unknown error'}`,
    blocks: [
      slackHeader('⚠️ Pipeline Run Failed'),
      slackFieldsSection({
        'Failed Sources': sources,
        'Offers': String(run.totalOffers),
        'Offer Errors': String(run.totalOfferErrors),
        'Duration': durationText(run),
        ...(run.errorMessage ? { 'Error': `\`${run.errorMessage.slice(0, 200)}\`` } : {}),
      }),
      slackDivider(),
      ...statusButton(),
      slackContext(`Run ID: ${run.runId} • Started: ${run.startedAt.toISOString()}`),
    ],
  }, options);
}

// =============================================================================
// Run Recovered Notification
// =============================================================================

export async function notifyPipelineRunRecovered(
  run: PipelineRunAlertInfo,
  previousFailedRunId: string,
  options?: SlackSendOptions
): Promise<SlackResult> {
  return sendSlackMessage({
    text: `✅ Pipeline recovered: run ${run.runId} succeeded`,
    blocks: [
      slackHeader('✅ Pipeline Run Recovered'),
      slackFieldsSection({
        'Offers': String(run.totalOffers),
        'Duration': durationText(run),
        'Previous Failed Run': previousFailedRunId,
      }),
      slackContext(`Run ID: ${run.runId} • Started: ${run.startedAt.toISOString()}`),
    ],
  }, options);
}
