import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type { Alert, HostStatus } from '@rexec/shared';
import type { DegradedEvent, SessionState } from '../session/Session.js';

export interface SessionStateEvent {
  serverName: string;
  sessionId: string;
  state: SessionState;
  previous: SessionState;
}

export interface SessionClosedEvent {
  serverName: string;
  sessionId: string;
  error?: Error;
}

export interface MonitorSample {
  serverName: string;
  latency: number;
  status?: HostStatus;
}

type EventMap = {
  'session:state': SessionStateEvent;
  'session:degraded': DegradedEvent;
  'session:closed': SessionClosedEvent;
  'alert:raised': Alert;
  'alert:dropped': Alert;
  'monitor:sample': MonitorSample;
};

export type EventName = keyof EventMap;

export interface EventBusMessage {
  id: string;
  type: EventName;
  timestamp: Date;
  data: EventMap[EventName];
}

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    // Also emit a generic message for subscribers that want everything
    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler);
  }

  once<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.once(event, handler);
  }

  off<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.off(event, handler);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', handler);
  }

  offAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.off('*', handler);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
