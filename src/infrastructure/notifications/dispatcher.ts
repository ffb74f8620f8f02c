import type { Logger } from 'pino';
import type { AlertDispatcher, OperatorAlert } from '../../application/alerts.js';
import type { SlackConfig } from './slack.js';
import { sendSlackAlert } from './slack.js';

export interface AlertConfig {
  slack: SlackConfig;
}

/**
 * Builds the dispatcher the pipeline raises operator alerts through.
 *
 * Every alert is logged (critical at error level, the rest at warn).
 * Slack delivery is fire-and-forget so a slow webhook never holds up the
 * pipeline loop.
 */
export function createAlertDispatcher(config: AlertConfig, log: Logger): AlertDispatcher {
  return (alert: OperatorAlert): void => {
    if (alert.severity === 'critical') {
      log.error({ alert }, `Operator alert: [${alert.kind}] ${alert.message}`);
    } else {
      log.warn({ alert }, `Operator alert: [${alert.kind}] ${alert.message}`);
    }

    void sendSlackAlert(config.slack, log, alert).catch((err: unknown) => {
      log.warn({ err }, 'Slack dispatch failed');
    });
  };
}
