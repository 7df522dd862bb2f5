export type AlertSeverity = 'info' | 'warning' | 'critical';

export type AlertCode = 'unreachable' | 'degraded' | 'threshold' | 'recovered' | 'custom';

export interface Alert {
  timestamp: Date;
  severity: AlertSeverity;
  code: AlertCode;
  message: string;
  serverName: string;
}
