import { nanoid } from 'nanoid';
import type {
  BatchRequestPayload,
  CommandRequestPayload,
  CommandResponsePayload,
  Frame,
  FrameType,
  PingRequestPayload,
  PingResponsePayload,
} from '@rexec/shared';

export function createFrame<T>(type: FrameType, payload: T, id: string = nanoid()): Frame<T> {
  return { type, id, payload };
}

export function createCommandFrame(text: string, timeout: number): Frame<CommandRequestPayload> {
  return createFrame('command', { text, timeout });
}

export function createBatchFrame(items: BatchRequestPayload['items']): Frame<BatchRequestPayload> {
  return createFrame('batch', { items });
}

export function createPingFrame(probe: boolean): Frame<PingRequestPayload> {
  return createFrame('ping', { probe });
}

export function createResponse<T extends CommandResponsePayload | PingResponsePayload>(
  id: string,
  payload: T,
): Frame<T> {
  return createFrame('response', payload, id);
}
