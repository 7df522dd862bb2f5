export const PROTOCOL_VERSION = 1;

export const DEFAULT_PORT = 443;
export const DEFAULT_TIMEOUT = 60_000;
export const DEFAULT_RESTART_MAX_WAIT = 60_000;
export const DEFAULT_MONITORING_INTERVAL = 30_000;
export const DEFAULT_HANDSHAKE_TIMEOUT = 15_000;
export const DEFAULT_CONNECT_TIMEOUT = 30_000;

/** Lower bound between reconnection polls while a host restarts. */
export const RESTART_POLL_INTERVAL = 2_000;

export const DEFAULT_RECONNECT_ATTEMPTS = 5;
export const DEFAULT_RECONNECT_BASE_DELAY = 500;
export const DEFAULT_RECONNECT_MAX_DELAY = 30_000;

export const DEFAULT_PING_TIMEOUT = 10_000;
export const DEFAULT_PING_FAILURE_THRESHOLD = 3;

/** Accepted clock skew for handshake timestamps, either direction. */
export const NONCE_WINDOW = 30_000;
export const NONCE_BYTES = 32;

export const MAX_FRAME_SIZE = 16 * 1024 * 1024;
export const FRAME_HEADER_SIZE = 4;

export const DEFAULT_ALERT_CAPACITY = 100;

export const DEFAULT_LOAD_THRESHOLD = 90;
export const DEFAULT_MEMORY_THRESHOLD = 90;
export const DEFAULT_DISK_THRESHOLD = 90;
