import { z } from 'zod';

const durationSchema = z.union([z.number().nonnegative(), z.string().min(1)]);

const portSchema = z.number().int().min(1).max(65535);

export const hopSchema = z.tuple([z.string().min(1), portSchema]);

export const tlsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  reject_unauthorized: z.boolean().default(false),
  servername: z.string().optional(),
});

export const thresholdsSchema = z.object({
  load: z.number().positive().optional(),
  memory: z.number().min(0).max(100).optional(),
  disk: z.number().min(0).max(100).optional(),
});

export const serverEntrySchema = z.object({
  host: z.string().min(1),
  port: portSchema.default(443),
  use_https_disguise: z.boolean().default(true),
  proxy_server: hopSchema.nullable().optional(),
  proxy_chain: z.array(hopSchema).optional(),
  timeout: durationSchema.optional(),
  restart_max_wait: durationSchema.optional(),
  monitoring_interval: durationSchema.optional(),
  tls: tlsConfigSchema.optional(),
  thresholds: thresholdsSchema.optional(),
});

export const clientConfigSchema = z
  .object({
    servers: z.record(serverEntrySchema),
    default_server: z.string().min(1).optional(),
    timeout: durationSchema.default(60),
    restart_max_wait: durationSchema.default(60),
    monitoring_interval: durationSchema.default(30),
    alert_capacity: z.number().int().positive().default(100),
  })
  .superRefine((config, ctx) => {
    if (config.default_server !== undefined && !(config.default_server in config.servers)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['default_server'],
        message: `default_server "${config.default_server}" is not a configured server`,
      });
    }
  });

export type ServerEntry = z.infer<typeof serverEntrySchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ValidatedClientConfig = z.infer<typeof clientConfigSchema>;
