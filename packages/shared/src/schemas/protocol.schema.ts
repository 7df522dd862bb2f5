import { z } from 'zod';

export const frameTypeSchema = z.enum(['auth', 'command', 'batch', 'ping', 'response']);

export const frameSchema = z.object({
  type: frameTypeSchema,
  id: z.string().min(1),
  seq: z.number().int().nonnegative().optional(),
  payload: z.unknown(),
  mac: z.string().optional(),
});

export const authRejectReasonSchema = z.enum(['unknown_host', 'bad_signature', 'expired', 'replay']);

export const helloPayloadSchema = z.object({
  step: z.literal('hello'),
  version: z.number().int(),
  clientId: z.string().min(1),
  clientKey: z.string().min(1),
  nonce: z.string().min(1),
  timestamp: z.number(),
  ephemeralKey: z.string().min(1),
});

export const challengePayloadSchema = z.object({
  step: z.literal('challenge'),
  hostKey: z.string().min(1),
  nonce: z.string().min(1),
  timestamp: z.number(),
  ephemeralKey: z.string().min(1),
  signature: z.string().min(1),
});

export const proofPayloadSchema = z.object({
  step: z.literal('proof'),
  signature: z.string().min(1),
});

export const acceptPayloadSchema = z.object({
  step: z.literal('accept'),
  sessionId: z.string(),
});

export const rejectPayloadSchema = z.object({
  step: z.literal('reject'),
  reason: authRejectReasonSchema,
});

export const hostReplySchema = z.discriminatedUnion('step', [
  challengePayloadSchema,
  acceptPayloadSchema,
  rejectPayloadSchema,
]);

export const commandRequestSchema = z.object({
  text: z.string(),
  timeout: z.number().positive(),
});

export const batchRequestSchema = z.object({
  items: z.array(commandRequestSchema.extend({ id: z.string().min(1) })),
});

export const commandResponseSchema = z.object({
  command: z.string(),
  stdout: z.string(),
  stderr: z.string(),
  exitCode: z.number().int().nullable(),
});

export const hostStatusSchema = z.object({
  loadAverage: z.tuple([z.number(), z.number(), z.number()]),
  cpuCount: z.number().int().positive(),
  memory: z.object({
    total: z.number().nonnegative(),
    used: z.number().nonnegative(),
  }),
  disks: z.array(
    z.object({
      mount: z.string(),
      usedPercent: z.number().min(0).max(100),
    }),
  ),
  uptime: z.number().nonnegative().optional(),
});

export const pingRequestSchema = z.object({
  probe: z.boolean(),
});

export const pingResponseSchema = z.object({
  pong: z.literal(true),
  status: hostStatusSchema.optional(),
});
