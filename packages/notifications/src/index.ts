/**
 * @dealcheck/notifications
 *
 * Operational notifications for the dealcheck pipeline (Slack webhooks).
 *
 * Environment Variables:
 * - SLACK_PIPELINE_ALERTS_WEBHOOK_URL: Slack webhook for run alerts (alerts are skipped when unset)
 * - DASHBOARD_URL: Link target for "View Run Status" buttons
 */

// =============================================================================
// Channel Exports
// =============================================================================

export {
  sendSlackMessage,
  slackHeader,
  slackText,
  slackDivider,
  slackContext,
  slackActions,
  slackButton,
  slackFieldsSection,
  getSlackConfig,
  truncate,
  DEFAULT_SLACK_TIMEOUT_MS,
  type SlackConfig,
  type SlackSendOptions,
  type SlackResult,
  type SlackMessage,
  type SlackBlock,
} from './channels/slack';

// =============================================================================
// Notification Exports
// =============================================================================

export {
  notifyPipelineRunFailed,
  notifyPipelineRunRecovered,
  type PipelineRunAlertInfo,
} from './notifications/pipeline-alerts';
