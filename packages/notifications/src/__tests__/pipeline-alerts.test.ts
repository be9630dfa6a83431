import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { notifyPipelineRunFailed, notifyPipelineRunRecovered, type PipelineRunAlertInfo } from '../notifications/pipeline-alerts';
import { getSlackConfig, sendSlackMessage, slackButton, slackFieldsSection, slackHeader, truncate } from '../channels/slack';

const WEBHOOK = 'https://hooks.slack.test/services/test-secret';

const run: PipelineRunAlertInfo = {
  runId: 'run-1',
  startedAt: new Date('2026-03-01T10:00:00Z'),
  finishedAt: new Date('2026-03-01T10:00:42Z'),
  totalOffers: 0,
  totalOfferErrors: 0,
  errorMessage: 'Source failed: shop-b.test',
  failedSources: [{ domain: 'shop-b.test', error: 'HTTP 503' }],
};

interface PostedBody {
  text: string;
  blocks: Array<{ type: string; fields?: Array<{ text: string }>; elements?: unknown[] }>;
}

function silenceConsole(): void {
  vi.spyOn(console, 'debug').mockImplementation(() => {});
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
}

describe('pipeline alerts', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    vi.stubGlobal('fetch', fetchMock);
    vi.stubEnv('SLACK_PIPELINE_ALERTS_WEBHOOK_URL', WEBHOOK);
    vi.stubEnv('DASHBOARD_URL', '');
    silenceConsole();
    fetchMock.mockReset();
    fetchMock.mockResolvedValue(new Response('ok', { status: 200 }));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  function postedBody(): PostedBody {
    const init = fetchMock.mock.calls[0]?.[1];
    return JSON.parse(String(init?.body));
  }

  it('posts a failure summary to the pipeline webhook', async () => {
    const result = await notifyPipelineRunFailed(run);

    expect(result).toEqual({ success: true, attempts: 1 });
    expect(fetchMock).toHaveBeenCalledWith(WEBHOOK, expect.objectContaining({ method: 'POST' }));

    const body = postedBody();
    expect(body.text).toBe('⚠️ Pipeline run failed: Source failed: shop-b.test');
    expect(body.blocks[1]?.fields?.map((f) => f.text)).toEqual([
      '*Failed Sources:*\nshop-b.test (HTTP 503)',
      '*Offers:*\n0',
      '*Offer Errors:*\n0',
      '*Duration:*\n42s',
      '*Error:*\n`Source failed: shop-b.test`',
    ]);
    expect(body.blocks.some((b) => b.type === 'actions')).toBe(false);
  });

  it('adds a status button when DASHBOARD_URL is set', async () => {
    vi.stubEnv('DASHBOARD_URL', 'https://dash.test/');

    await notifyPipelineRunFailed(run);

    const actions = postedBody().blocks.find((b) => b.type === 'actions');
    expect(actions?.elements).toEqual([
      expect.objectContaining({ url: 'https://dash.test/status', style: 'danger' }),
    ]);
  });

  it('announces recovery with the previous failed run id', async () => {
    await notifyPipelineRunRecovered({ ...run, errorMessage: null, failedSources: [], totalOffers: 12 }, 'run-0');

    const body = postedBody();
    expect(body.text).toBe('✅ Pipeline recovered: run run-1 succeeded');
    expect(body.blocks[1]?.fields?.map((f) => f.text)).toEqual([
      '*Offers:*\n12',
      '*Duration:*\n42s',
      '*Previous Failed Run:*\nrun-0',
    ]);
  });
});

describe('sendSlackMessage', () => {
  const fetchMock = vi.fn();

  beforeEach(() => {
    silenceConsole();
    fetchMock.mockReset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('skips without a webhook', async () => {
    vi.stubEnv('SLACK_PIPELINE_ALERTS_WEBHOOK_URL', '');

    const result = await sendSlackMessage({ text: 'hello' }, { fetchImpl: fetchMock });

    expect(result).toEqual({ success: true, skipped: true, attempts: 0 });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('does not retry a client error', async () => {
    fetchMock.mockResolvedValue(new Response('invalid_payload', { status: 400 }));

    const result = await sendSlackMessage({ text: 'hello' }, { webhookUrl: WEBHOOK, fetchImpl: fetchMock });

    expect(result).toEqual({ success: false, error: 'HTTP 400: invalid_payload', attempts: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries once after a server error', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));

    const result = await sendSlackMessage({ text: 'hello' }, { webhookUrl: WEBHOOK, fetchImpl: fetchMock });

    expect(result).toEqual({ success: true, attempts: 2 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('reports a network error after the last attempt', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNRESET'));

    const result = await sendSlackMessage(
      { text: 'hello' },
      { webhookUrl: WEBHOOK, fetchImpl: fetchMock, retries: 0 }
    );

    expect(result).toEqual({ success: false, error: 'ECONNRESET', attempts: 1 });
  });
});

describe('block helpers', () => {
  it('lays fields out in two columns, at most ten', () => {
    const fields = Object.fromEntries(Array.from({ length: 12 }, (_, i) => [`F${i}`, String(i)]));

    const section = slackFieldsSection(fields);

    expect(section.fields).toHaveLength(10);
    expect(section.fields?.[0]).toEqual({ type: 'mrkdwn', text: '*F0:*\n0' });
  });

  it('truncates headers to the Block Kit limit', () => {
    expect(slackHeader('x'.repeat(200)).text.text).toHaveLength(150);
    expect(truncate('abcdef', 4)).toBe('abc…');
  });

  it('derives a stable action id and omits an unset style', () => {
    expect(slackButton('View Run Status', 'https://dash.test/status')).toEqual({
      type: 'button',
      text: { type: 'plain_text', text: 'View Run Status', emoji: true },
      url: 'https://dash.test/status',
      action_id: 'button_view_run_status',
    });
  });

  it('reads configuration at call time', () => {
    expect(getSlackConfig({ SLACK_PIPELINE_ALERTS_WEBHOOK_URL: WEBHOOK, DASHBOARD_URL: '' })).toEqual({
      pipelineAlertsWebhookUrl: WEBHOOK,
      dashboardUrl: undefined,
    });
  });
});
