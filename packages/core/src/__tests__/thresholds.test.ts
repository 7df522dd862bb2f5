import { describe, it, expect } from 'vitest';
import type { HostStatus } from '@rexec/shared';
import { evaluateThresholds } from '../monitor/thresholds.js';

const limits = { load: 90, memory: 80, disk: 90 };

function status(overrides: Partial<HostStatus> = {}): HostStatus {
  return {
    loadAverage: [1, 1, 1],
    cpuCount: 4,
    memory: { total: 8589934592, used: 1073741824 },
    disks: [{ mount: '/', usedPercent: 30 }],
    ...overrides,
  };
}

describe('evaluateThresholds', () => {
  it('should report nothing for a healthy host', () => {
    expect(evaluateThresholds(status(), limits)).toEqual([]);
  });

  it('should compare load per CPU', () => {
    const breaches = evaluateThresholds(status({ loadAverage: [6, 2, 1] }), limits);

    expect(breaches).toEqual([
      {
        resource: 'load',
        value: 150,
        threshold: 90,
        message: 'Load average 6.00 on 4 CPUs (150.0%) exceeds 90%',
      },
    ]);
  });

  it('should report memory usage with sizes', () => {
    const breaches = evaluateThresholds(
      status({ memory: { total: 8589934592, used: 7516192768 } }),
      limits,
    );

    expect(breaches.map((b) => b.message)).toEqual(['Memory usage 87.5% (7 GB of 8 GB) exceeds 80%']);
  });

  it('should report every full disk', () => {
    const breaches = evaluateThresholds(
      status({
        disks: [
          { mount: '/', usedPercent: 95 },
          { mount: '/data', usedPercent: 50 },
          { mount: '/var', usedPercent: 99.5 },
        ],
      }),
      limits,
    );

    expect(breaches.map((b) => b.message)).toEqual([
      'Disk / usage 95.0% exceeds 90%',
      'Disk /var usage 99.5% exceeds 90%',
    ]);
  });

  it('should not alert at exactly the threshold', () => {
    expect(evaluateThresholds(status({ disks: [{ mount: '/', usedPercent: 90 }] }), limits)).toEqual([]);
  });

  it('should skip memory when the total is unknown', () => {
    expect(evaluateThresholds(status({ memory: { total: 0, used: 10 } }), limits)).toEqual([]);
  });
});
