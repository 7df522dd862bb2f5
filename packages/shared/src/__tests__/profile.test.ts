import { describe, it, expect } from 'vitest';
import { createServerProfile, loadProfiles } from '../profile/profile.js';
import { ConfigValidationError } from '../utils/errors.js';

describe('createServerProfile', () => {
  it('should apply defaults', () => {
    const profile = createServerProfile({ name: 'web', host: 'web.example.test' });

    expect(profile).toEqual({
      name: 'web',
      host: 'web.example.test',
      port: 443,
      useHttpsDisguise: true,
      proxyChain: [],
      timeout: 60000,
      restartMaxWait: 60000,
      monitoringInterval: 30000,
      tls: { enabled: true, rejectUnauthorized: false },
      thresholds: { load: 90, memory: 90, disk: 90 },
    });
  });

  it('should freeze the profile and everything inside it', () => {
    const profile = createServerProfile({
      name: 'web',
      host: 'web.example.test',
      proxyChain: [{ host: 'jump.example.test', port: 3128 }],
    });

    expect(Object.isFrozen(profile)).toBe(true);
    expect(Object.isFrozen(profile.proxyChain)).toBe(true);
    expect(Object.isFrozen(profile.proxyChain[0])).toBe(true);
    expect(Object.isFrozen(profile.tls)).toBe(true);
    expect(Object.isFrozen(profile.thresholds)).toBe(true);
  });

  it('should not share the caller proxy chain', () => {
    const chain = [{ host: 'jump.example.test', port: 3128 }];
    const profile = createServerProfile({ name: 'web', host: 'web.example.test', proxyChain: chain });

    chain[0].port = 9999;
    expect(profile.proxyChain[0].port).toBe(3128);
  });

  it('should keep an explicit TLS server name', () => {
    const profile = createServerProfile({
      name: 'web',
      host: '10.0.0.5',
      tls: { servername: 'web.example.test' },
    });

    expect(profile.tls).toEqual({
      enabled: true,
      rejectUnauthorized: false,
      servername: 'web.example.test',
    });
  });

  it('should report every invalid field', () => {
    let caught: unknown;
    try {
      createServerProfile({ name: 'web', host: '', port: 70000 });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.errors).toEqual([
        'host: String must contain at least 1 character(s)',
        'port: Number must be less than or equal to 65535',
      ]);
    }
  });

  it('should reject thresholds out of range', () => {
    let caught: unknown;
    try {
      createServerProfile({
        name: 'web',
        host: 'web.example.test',
        thresholds: { load: -5, memory: Number.NaN, disk: 120 },
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.errors).toEqual([
        'thresholds.load: Number must be greater than 0',
        'thresholds.memory: Expected number, received nan',
        'thresholds.disk: Number must be less than or equal to 100',
      ]);
    }
  });

  it('should reject an empty TLS server name', () => {
    expect(() =>
      createServerProfile({ name: 'web', host: '10.0.0.5', tls: { servername: '' } }),
    ).toThrow(ConfigValidationError);
  });
});

describe('loadProfiles', () => {
  it('should build a profile for every server', () => {
    const loaded = loadProfiles({
      servers: {
        web: { host: 'web.example.test', port: 8443, proxy_server: ['jump.example.test', 3128] },
        db: {
          host: 'db.example.test',
          use_https_disguise: false,
          timeout: '90s',
          proxy_chain: [
            ['a.example.test', 8080],
            ['b.example.test', 8081],
          ],
        },
      },
      default_server: 'web',
      timeout: 30,
    });

    expect(loaded.defaultServer).toBe('web');
    expect(loaded.alertCapacity).toBe(100);
    expect([...loaded.profiles.keys()]).toEqual(['web', 'db']);

    const web = loaded.profiles.get('web');
    expect(web?.port).toBe(8443);
    expect(web?.timeout).toBe(30000);
    expect(web?.restartMaxWait).toBe(60000);
    expect(web?.monitoringInterval).toBe(30000);
    expect(web?.proxyChain).toEqual([{ host: 'jump.example.test', port: 3128 }]);

    const db = loaded.profiles.get('db');
    expect(db?.port).toBe(443);
    expect(db?.useHttpsDisguise).toBe(false);
    expect(db?.timeout).toBe(90000);
    expect(db?.proxyChain).toEqual([
      { host: 'a.example.test', port: 8080 },
      { host: 'b.example.test', port: 8081 },
    ]);
  });

  it('should prefer proxy_chain over proxy_server', () => {
    const loaded = loadProfiles({
      servers: {
        web: {
          host: 'web.example.test',
          proxy_server: ['ignored.example.test', 1080],
          proxy_chain: [['relay.example.test', 8080]],
        },
      },
    });

    expect(loaded.profiles.get('web')?.proxyChain).toEqual([{ host: 'relay.example.test', port: 8080 }]);
  });

  it('should map TLS and threshold settings', () => {
    const loaded = loadProfiles({
      servers: {
        web: {
          host: 'web.example.test',
          tls: { enabled: false },
          thresholds: { memory: 75 },
        },
      },
      alert_capacity: 10,
    });

    const web = loaded.profiles.get('web');
    expect(web?.tls).toEqual({ enabled: false, rejectUnauthorized: false });
    expect(web?.thresholds).toEqual({ load: 90, memory: 75, disk: 90 });
    expect(loaded.alertCapacity).toBe(10);
  });

  it('should reject a default_server that is not configured', () => {
    expect(() => loadProfiles({ servers: { web: { host: 'web.example.test' } }, default_server: 'nope' })).toThrow(
      'default_server: default_server "nope" is not a configured server',
    );
  });

  it('should prefix schema issues with their path', () => {
    let caught: unknown;
    try {
      loadProfiles({ servers: { web: { host: 'web.example.test', port: 0 } } });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.errors).toEqual(['servers.web.port: Number must be greater than or equal to 1']);
    }
  });

  it('should name the server with an unparseable duration', () => {
    expect(() =>
      loadProfiles({ servers: { web: { host: 'web.example.test', timeout: 'soon' } } }),
    ).toThrow('servers.web: Invalid duration string: "soon"');
  });

  it('should reject a missing servers map', () => {
    expect(() => loadProfiles({ default_server: 'web' })).toThrow(ConfigValidationError);
  });
});
