import { createLogger, toError } from '@rexec/shared';
import type { AlertCode, AlertSeverity, ServerProfile } from '@rexec/shared';
import type { PingResult, Session } from '../session/Session.js';
import type { SessionRegistry } from '../session/SessionRegistry.js';
import { evaluateThresholds } from './thresholds.js';

const logger = createLogger({ name: 'monitor' });

interface MonitorLoop {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Periodic reachability and resource checks, one loop per profile. Findings
 * go to the registry's alert queue; nothing is ever thrown at the caller.
 */
export class Monitor {
  private readonly registry: SessionRegistry;
  private readonly loops: Map<string, MonitorLoop> = new Map();

  constructor(registry: SessionRegistry) {
    this.registry = registry;
  }

  isRunning(name: string): boolean {
    return this.loops.has(name);
  }

  /** Start checking `profile` every `interval` ms. A running loop is left alone. */
  start(profile: ServerProfile, interval: number = profile.monitoringInterval): void {
    if (this.loops.has(profile.name)) {
      logger.debug({ server: profile.name }, 'Monitoring already running');
      return;
    }

    const controller = new AbortController();
    const done = this.run(profile, interval, controller.signal).catch((err: unknown) => {
      logger.error({ server: profile.name, err: toError(err).message }, 'Monitor loop crashed');
    });
    this.loops.set(profile.name, { controller, done });
    logger.info({ server: profile.name, interval }, 'Monitoring started');
  }

  /**
   * Stop the loop for `name`. Resolves after the loop has seen the abort and
   * released its timers, including those of an in-flight ping.
   */
  async stop(name: string): Promise<void> {
    const loop = this.loops.get(name);
    if (!loop) {
      return;
    }

    loop.controller.abort();
    await loop.done;
    this.loops.delete(name);
    logger.info({ server: name }, 'Monitoring stopped');
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.loops.keys()].map((name) => this.stop(name)));
  }

  private async run(profile: ServerProfile, interval: number, signal: AbortSignal): Promise<void> {
    let failing = false;
    while (!signal.aborted) {
      failing = await this.check(profile, signal, failing);
      if (!(await this.registry.clock.sleep(interval, signal))) {
        break;
      }
    }
  }

  /** One sample. Returns whether the host is currently failing. */
  private async check(profile: ServerProfile, signal: AbortSignal, failing: boolean): Promise<boolean> {
    let session: Session;
    try {
      session = await this.registry.acquire(profile, { signal });
    } catch (err) {
      if (signal.aborted) return failing;
      this.alert(profile, 'critical', 'unreachable', `Server ${profile.name} is unreachable: ${toError(err).message}`);
      return true;
    }

    let sample: PingResult;
    try {
      sample = await session.ping({ probe: true, signal });
    } catch (err) {
      if (signal.aborted) return failing;
      this.alert(profile, 'warning', 'degraded', `Ping to ${profile.name} failed: ${toError(err).message}`);
      return true;
    }

    this.registry.events.emit('monitor:sample', {
      serverName: profile.name,
      latency: sample.latency,
      status: sample.status,
    });

    if (failing) {
      this.alert(profile, 'info', 'recovered', `Server ${profile.name} recovered (latency ${Math.round(sample.latency)}ms)`);
    }

    if (sample.status) {
      for (const breach of evaluateThresholds(sample.status, profile.thresholds)) {
        this.alert(profile, 'warning', 'threshold', breach.message);
      }
    }

    return false;
  }

  private alert(profile: ServerProfile, severity: AlertSeverity, code: AlertCode, message: string): void {
    logger.debug({ server: profile.name, severity, code }, message);
    this.registry.raiseAlert({
      timestamp: new Date(this.registry.clock.now()),
      severity,
      code,
      message,
      serverName: profile.name,
    });
  }
}
