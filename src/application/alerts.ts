export type AlertKind =
  | 'invalid_events'
  | 'merge_retries_exhausted'
  | 'record_too_large'
  | 'storage_unavailable'
  | 'source_unavailable'
  | 'analytical_sink_exhausted'
  | 'checkpoint_commit_failed';

export type AlertSeverity = 'warning' | 'critical';

/** Structured alert raised for an operator. */
export interface OperatorAlert {
  kind: AlertKind;
  severity: AlertSeverity;
  pipeline_id: string;
  batch_id: number;
  message: string;
  raised_at: string;
  details?: Record<string, unknown>;
}

/** Fire-and-forget delivery of an alert to every configured channel. */
export type AlertDispatcher = (alert: OperatorAlert) => void;
