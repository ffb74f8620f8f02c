import type { Logger } from 'pino';
import type { OperatorAlert } from '../../application/alerts.js';

export interface SlackConfig {
  enabled: boolean;
  webhook_url: string;
}

/**
 * Sends (or skips) a Slack notification for an operator alert.
 *
 * If Slack is disabled, logs a skip message at debug level.
 * If enabled, POSTs a formatted message to the configured webhook URL.
 * Failures are logged and never reach the pipeline.
 */
export async function sendSlackAlert(
  config: SlackConfig,
  log: Logger,
  alert: OperatorAlert,
): Promise<void> {
  if (!config.enabled) {
    log.debug({ kind: alert.kind, batch_id: alert.batch_id }, 'Slack alert skipped (disabled)');
    return;
  }

  if (!config.webhook_url) {
    log.warn('Slack enabled but webhook_url is empty, skipping');
    return;
  }

  try {
    const body = JSON.stringify({
      text: `*[${alert.severity.toUpperCase()}]* ${alert.kind}\n>${alert.message}\nPipeline: \`${alert.pipeline_id}\` | Batch: ${alert.batch_id} | Raised: ${alert.raised_at}`,
    });

    const response = await fetch(config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });

    if (response.ok) {
      log.info({ kind: alert.kind, batch_id: alert.batch_id }, 'Slack alert sent');
    } else {
      log.warn({ status: response.status, kind: alert.kind }, 'Slack webhook returned non-OK status');
    }
  } catch (err: unknown) {
    log.warn({ err, kind: alert.kind }, 'Failed to send Slack alert');
  }
}
