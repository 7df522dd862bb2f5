import { generateKeyPairSync, type KeyObject } from 'node:crypto';
import type { Duplex } from 'node:stream';
import {
  batchRequestSchema,
  commandRequestSchema,
  ConnectError,
  createServerProfile,
  pingRequestSchema,
  systemClock,
  toError,
} from '@rexec/shared';
import type { Clock, Frame, HostStatus, ServerProfile, ServerProfileInput } from '@rexec/shared';
import { HandshakeResponder } from '../../auth/HandshakeResponder.js';
import { StaticCredentialSource } from '../../auth/credentials.js';
import { createHttpDisguise, plainFraming } from '../../protocol/disguise.js';
import { FrameConnection } from '../../protocol/FrameConnection.js';
import { createResponse } from '../../protocol/messages.js';
import { createEndpointPair } from './endpoint.js';

export type HostAction =
  | {
      kind: 'reply';
      stdout?: string;
      stderr?: string;
      exitCode?: number | null;
      /** Echo a different command text than the one received. */
      command?: string;
      delay?: number;
    }
  | { kind: 'hang' }
  /** Drop the connection and refuse new ones for `downFor` ms. */
  | { kind: 'drop'; downFor?: number };

export function defaultBehaviour(text: string): HostAction {
  const [verb, ...rest] = text.split(' ');
  const argument = rest.join(' ');

  switch (verb) {
    case 'echo':
      return { kind: 'reply', stdout: `${argument}\n` };
    case 'exit':
      return { kind: 'reply', exitCode: Number(argument), stderr: `exited with ${argument}\n` };
    case 'sleep':
      return { kind: 'reply', delay: Number(argument), stdout: `slept ${argument}\n` };
    case 'hang':
      return { kind: 'hang' };
    case 'reboot':
      return { kind: 'drop', downFor: Number(argument || '5000') };
    case 'mismatch':
      return { kind: 'reply', command: 'something else' };
    default:
      return { kind: 'reply', stdout: `ran ${text}\n` };
  }
}

export const HEALTHY_STATUS: HostStatus = {
  loadAverage: [0.5, 0.4, 0.3],
  cpuCount: 4,
  memory: { total: 8589934592, used: 2147483648 },
  disks: [{ mount: '/', usedPercent: 40 }],
};

export interface FakeHostOptions {
  behaviour?: (text: string) => HostAction;
  status?: HostStatus;
  /** Used for refusal windows; handshakes always use the system clock. */
  clock?: Clock;
  authorizeClient?: boolean;
}

/**
 * In-process remote endpoint: answers the real handshake and serves
 * commands over in-memory streams.
 */
export class FakeHost {
  readonly hostKeys = generateKeyPairSync('ed25519');
  readonly clientKeys = generateKeyPairSync('ed25519');
  readonly connections: FrameConnection[] = [];
  readonly commands: string[] = [];
  readonly batches: number[] = [];
  readonly handshakeErrors: Error[] = [];
  /** Ping frames received, answered or not. */
  pings: number = 0;

  behaviour: (text: string) => HostAction;
  status: HostStatus;
  refuse: boolean = false;
  pingMode: 'answer' | 'hang' = 'answer';
  connectAttempts: number = 0;

  private readonly clock: Clock;
  private downUntil: number = 0;
  private readonly responder: HandshakeResponder;

  constructor(options: FakeHostOptions = {}) {
    this.behaviour = options.behaviour ?? defaultBehaviour;
    this.status = options.status ?? HEALTHY_STATUS;
    this.clock = options.clock ?? systemClock;
    this.responder = new HandshakeResponder({
      hostKey: this.hostKeys.privateKey,
      authorizedKeys: options.authorizeClient === false ? [] : [this.clientKeys.publicKey],
    });
  }

  credentials(trustedHostKey: KeyObject = this.hostKeys.publicKey): StaticCredentialSource {
    return new StaticCredentialSource({
      clientId: 'test-client',
      privateKey: this.clientKeys.privateKey,
      trustedHostKeys: [trustedHostKey],
    });
  }

  readonly transport = async (profile: ServerProfile): Promise<Duplex> => {
    this.connectAttempts++;
    if (this.refuse || this.clock.now() < this.downUntil) {
      throw new ConnectError('refused', `Connection refused by ${profile.host}:${profile.port}`);
    }

    const [client, server] = createEndpointPair();
    this.accept(server, profile);
    return client;
  };

  /** Send a frame to every open client connection. */
  broadcast(frame: Frame): void {
    for (const connection of this.connections) {
      if (connection.isOpen()) {
        connection.send(frame);
      }
    }
  }

  dropAll(): void {
    for (const connection of this.connections) {
      connection.destroy();
    }
  }

  openConnections(): number {
    return this.connections.filter((connection) => connection.isOpen()).length;
  }

  private accept(stream: Duplex, profile: ServerProfile): void {
    const connection = new FrameConnection(stream, {
      disguise: profile.useHttpsDisguise
        ? createHttpDisguise({ role: 'server', host: profile.host })
        : plainFraming,
      label: 'fake-host',
    });
    this.connections.push(connection);

    this.responder.respond(connection).then(
      (accepted) => {
        connection.enableIntegrity(accepted.sessionKey);
        connection.on('frame', (frame: Frame) => this.handle(connection, frame));
      },
      (err: unknown) => {
        this.handshakeErrors.push(toError(err));
        connection.destroy();
      },
    );
  }

  private handle(connection: FrameConnection, frame: Frame): void {
    if (frame.type === 'command') {
      const request = commandRequestSchema.parse(frame.payload);
      this.run(connection, frame.id, request.text);
    } else if (frame.type === 'batch') {
      const batch = batchRequestSchema.parse(frame.payload);
      this.batches.push(batch.items.length);
      for (const item of batch.items) {
        this.run(connection, item.id, item.text);
      }
    } else if (frame.type === 'ping') {
      this.pings++;
      if (this.pingMode === 'hang') return;
      const { probe } = pingRequestSchema.parse(frame.payload);
      connection.send(
        createResponse(frame.id, probe ? { pong: true, status: this.status } : { pong: true }),
      );
    }
  }

  private run(connection: FrameConnection, id: string, text: string): void {
    this.commands.push(text);
    const action = this.behaviour(text);

    if (action.kind === 'hang') return;

    if (action.kind === 'drop') {
      this.downUntil = this.clock.now() + (action.downFor ?? 0);
      connection.destroy();
      return;
    }

    const reply = () => {
      if (!connection.isOpen()) return;
      connection.send(
        createResponse(id, {
          command: action.command ?? text,
          stdout: action.stdout ?? '',
          stderr: action.stderr ?? '',
          exitCode: action.exitCode === undefined ? 0 : action.exitCode,
        }),
      );
    };

    if (action.delay) {
      setTimeout(reply, action.delay);
    } else {
      reply();
    }
  }
}

export function testProfile(overrides: Partial<ServerProfileInput> = {}): ServerProfile {
  return createServerProfile({
    name: 'web',
    host: 'web.example.test',
    timeout: 2000,
    ...overrides,
  });
}
