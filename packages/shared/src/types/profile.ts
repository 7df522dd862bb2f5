export interface HopAddress {
  host: string;
  port: number;
}

export interface TlsOptions {
  enabled: boolean;
  rejectUnauthorized: boolean;
  servername?: string;
}

/** Resource thresholds, in percent, checked against a host status probe. */
export interface ResourceThresholds {
  /** 1-minute load average per CPU, as a percentage (100 = fully loaded). */
  load: number;
  memory: number;
  disk: number;
}

/**
 * Named, immutable description of how to reach and authenticate to one host.
 * All durations are in milliseconds.
 */
export interface ServerProfile {
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly useHttpsDisguise: boolean;
  readonly proxyChain: readonly Readonly<HopAddress>[];
  readonly timeout: number;
  readonly restartMaxWait: number;
  readonly monitoringInterval: number;
  readonly tls: Readonly<TlsOptions>;
  readonly thresholds: Readonly<ResourceThresholds>;
}
