import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProtocolError, RestartTimeoutError } from '@rexec/shared';
import { KeyAuthenticator } from '../auth/KeyAuthenticator.js';
import { RestartCoordinator } from '../restart/RestartCoordinator.js';
import { SessionRegistry } from '../session/SessionRegistry.js';
import { FakeClock } from './helpers/clock.js';
import { FakeHost, testProfile } from './helpers/fakeHost.js';

describe('RestartCoordinator', () => {
  let clock: FakeClock;
  let host: FakeHost;
  let registry: SessionRegistry;

  beforeEach(() => {
    clock = new FakeClock();
    host = new FakeHost({ clock });
    registry = new SessionRegistry({
      authenticator: new KeyAuthenticator(host.credentials()),
      transport: host.transport,
      reconnect: { maxAttempts: 1 },
      clock,
    });
  });

  afterEach(async () => {
    await registry.closeAll();
    host.dropAll();
  });

  it('should wait for the host to come back after it drops the connection', async () => {
    const coordinator = new RestartCoordinator(registry);
    const profile = testProfile();
    const before = await registry.acquire(profile);

    const result = await coordinator.execute(profile, { text: 'reboot 5000', waitForRestart: true });

    expect(result).toEqual({
      command: 'reboot 5000',
      stdout: 'restart completed after 6.0s',
      stderr: '',
      exitCode: 0,
      duration: 6000,
      downtime: 6000,
    });
    expect(clock.sleeps).toEqual([2000, 2000, 2000]);
    expect(before.getState()).toBe('closed');
    expect(registry.get('web')).not.toBe(before);
    expect(registry.get('web')?.isReady()).toBe(true);
  });

  it('should keep the exit status when the command answered before going down', async () => {
    const coordinator = new RestartCoordinator(registry);

    const result = await coordinator.execute(testProfile(), { text: 'exit 7' });

    expect(result.exitCode).toBe(7);
    expect(result.downtime).toBe(2000);
    expect(result.stdout).toBe('restart completed after 2.0s');
  });

  it('should give up once the maximum wait has passed', async () => {
    const coordinator = new RestartCoordinator(registry);
    const profile = testProfile({ restartMaxWait: 5000 });

    const error = await coordinator.execute(profile, { text: 'reboot 1000000' }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RestartTimeoutError);
    expect(error instanceof RestartTimeoutError && error.elapsed).toBe(5000);
    expect(error instanceof RestartTimeoutError && error.message).toBe(
      'Host did not come back within 5000ms (waited 5000ms)',
    );
    expect(clock.sleeps).toEqual([2000, 2000, 1000]);
    expect(registry.get('web')).toBeUndefined();
  });

  it('should treat a command timeout as the expected drop', async () => {
    const coordinator = new RestartCoordinator(registry);

    const result = await coordinator.execute(testProfile(), { text: 'hang', timeout: 20 });

    expect(result.exitCode).toBe(0);
    expect(result.downtime).toBe(2000);
  });

  it('should rethrow errors that are not a dropped connection', async () => {
    const coordinator = new RestartCoordinator(registry);

    await expect(coordinator.execute(testProfile(), { text: 'mismatch' })).rejects.toBeInstanceOf(ProtocolError);
    expect(clock.sleeps).toEqual([]);
  });

  it('should never poll faster than every two seconds', async () => {
    const fast = new RestartCoordinator(registry, { pollInterval: 100 });
    await fast.execute(testProfile(), { text: 'echo fast' });
    expect(clock.sleeps).toEqual([2000]);

    const slow = new RestartCoordinator(registry, { pollInterval: 3000 });
    await slow.execute(testProfile(), { text: 'echo slow' });
    expect(clock.sleeps).toEqual([2000, 3000]);
  });
});
