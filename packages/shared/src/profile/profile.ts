import { z } from 'zod';
import type { HopAddress, ResourceThresholds, ServerProfile, TlsOptions } from '../types/profile.js';
import {
  DEFAULT_DISK_THRESHOLD,
  DEFAULT_LOAD_THRESHOLD,
  DEFAULT_MEMORY_THRESHOLD,
  DEFAULT_MONITORING_INTERVAL,
  DEFAULT_PORT,
  DEFAULT_RESTART_MAX_WAIT,
  DEFAULT_TIMEOUT,
} from '../constants.js';
import { clientConfigSchema, type ServerEntry } from '../schemas/config.schema.js';
import { ConfigValidationError } from '../utils/errors.js';
import { parseDuration } from '../utils/parser.js';

export interface ServerProfileInput {
  name: string;
  host: string;
  port?: number;
  useHttpsDisguise?: boolean;
  proxyChain?: HopAddress[];
  timeout?: number;
  restartMaxWait?: number;
  monitoringInterval?: number;
  tls?: Partial<TlsOptions>;
  thresholds?: Partial<ResourceThresholds>;
}

const profileInputSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  proxyChain: z.array(
    z.object({
      host: z.string().min(1),
      port: z.number().int().min(1).max(65535),
    }),
  ),
  timeout: z.number().positive(),
  restartMaxWait: z.number().nonnegative(),
  monitoringInterval: z.number().positive(),
  tls: z.object({
    enabled: z.boolean(),
    rejectUnauthorized: z.boolean(),
    servername: z.string().min(1).optional(),
  }),
  thresholds: z.object({
    load: z.number().positive(),
    memory: z.number().min(0).max(100),
    disk: z.number().min(0).max(100),
  }),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Build a validated, deeply frozen server profile.
 */
export function createServerProfile(input: ServerProfileInput): ServerProfile {
  const proxyChain = (input.proxyChain ?? []).map((hop) => Object.freeze({ host: hop.host, port: hop.port }));

  const profile: ServerProfile = {
    name: input.name,
    host: input.host,
    port: input.port ?? DEFAULT_PORT,
    useHttpsDisguise: input.useHttpsDisguise ?? true,
    proxyChain: Object.freeze(proxyChain),
    timeout: input.timeout ?? DEFAULT_TIMEOUT,
    restartMaxWait: input.restartMaxWait ?? DEFAULT_RESTART_MAX_WAIT,
    monitoringInterval: input.monitoringInterval ?? DEFAULT_MONITORING_INTERVAL,
    tls: Object.freeze({
      enabled: input.tls?.enabled ?? true,
      rejectUnauthorized: input.tls?.rejectUnauthorized ?? false,
      ...(input.tls?.servername !== undefined ? { servername: input.tls.servername } : {}),
    }),
    thresholds: Object.freeze({
      load: input.thresholds?.load ?? DEFAULT_LOAD_THRESHOLD,
      memory: input.thresholds?.memory ?? DEFAULT_MEMORY_THRESHOLD,
      disk: input.thresholds?.disk ?? DEFAULT_DISK_THRESHOLD,
    }),
  };

  const parsed = profileInputSchema.safeParse(profile);
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error));
  }

  return Object.freeze(profile);
}

export interface LoadedConfig {
  profiles: Map<string, ServerProfile>;
  defaultServer?: string;
  alertCapacity: number;
}

function toProfile(
  name: string,
  entry: ServerEntry,
  defaults: { timeout: number; restartMaxWait: number; monitoringInterval: number },
): ServerProfile {
  const hops = entry.proxy_chain ?? (entry.proxy_server ? [entry.proxy_server] : []);

  return createServerProfile({
    name,
    host: entry.host,
    port: entry.port,
    useHttpsDisguise: entry.use_https_disguise,
    proxyChain: hops.map(([host, port]) => ({ host, port })),
    timeout: entry.timeout !== undefined ? parseDuration(entry.timeout) : defaults.timeout,
    restartMaxWait:
      entry.restart_max_wait !== undefined
        ? parseDuration(entry.restart_max_wait)
        : defaults.restartMaxWait,
    monitoringInterval:
      entry.monitoring_interval !== undefined
        ? parseDuration(entry.monitoring_interval)
        : defaults.monitoringInterval,
    tls: entry.tls
      ? {
          enabled: entry.tls.enabled,
          rejectUnauthorized: entry.tls.reject_unauthorized,
          servername: entry.tls.servername,
        }
      : undefined,
    thresholds: entry.thresholds,
  });
}

/**
 * Validate a parsed configuration object and turn every server entry into a profile.
 */
export function loadProfiles(raw: unknown): LoadedConfig {
  const parsed = clientConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(formatIssues(parsed.error));
  }

  const config = parsed.data;
  let defaults: { timeout: number; restartMaxWait: number; monitoringInterval: number };
  try {
    defaults = {
      timeout: parseDuration(config.timeout),
      restartMaxWait: parseDuration(config.restart_max_wait),
      monitoringInterval: parseDuration(config.monitoring_interval),
    };
  } catch (err) {
    throw new ConfigValidationError([err instanceof Error ? err.message : String(err)]);
  }

  const profiles = new Map<string, ServerProfile>();
  for (const [name, entry] of Object.entries(config.servers)) {
    try {
      profiles.set(name, toProfile(name, entry, defaults));
    } catch (err) {
      if (err instanceof ConfigValidationError) {
        throw new ConfigValidationError(err.errors.map((e) => `servers.${name}.${e}`));
      }
      throw new ConfigValidationError([
        `servers.${name}: ${err instanceof Error ? err.message : String(err)}`,
      ]);
    }
  }

  return {
    profiles,
    defaultServer: config.default_server,
    alertCapacity: config.alert_capacity,
  };
}
