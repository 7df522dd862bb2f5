import { formatBytes, formatPercent } from '@rexec/shared';
import type { HostStatus, ResourceThresholds } from '@rexec/shared';

export interface ThresholdBreach {
  resource: 'load' | 'memory' | 'disk';
  /** Observed usage in percent. */
  value: number;
  threshold: number;
  message: string;
}

/**
 * Compare a host status probe against the profile's thresholds. Load is the
 * 1-minute average per CPU.
 */
export function evaluateThresholds(
  status: HostStatus,
  thresholds: Readonly<ResourceThresholds>,
): ThresholdBreach[] {
  const breaches: ThresholdBreach[] = [];

  const [load] = status.loadAverage;
  const loadPercent = (load / status.cpuCount) * 100;
  if (loadPercent > thresholds.load) {
    breaches.push({
      resource: 'load',
      value: loadPercent,
      threshold: thresholds.load,
      message: `Load average ${load.toFixed(2)} on ${status.cpuCount} CPUs (${formatPercent(loadPercent)}) exceeds ${thresholds.load}%`,
    });
  }

  const { total, used } = status.memory;
  if (total > 0) {
    const memoryPercent = (used / total) * 100;
    if (memoryPercent > thresholds.memory) {
      breaches.push({
        resource: 'memory',
        value: memoryPercent,
        threshold: thresholds.memory,
        message: `Memory usage ${formatPercent(memoryPercent)} (${formatBytes(used)} of ${formatBytes(total)}) exceeds ${thresholds.memory}%`,
      });
    }
  }

  for (const disk of status.disks) {
    if (disk.usedPercent > thresholds.disk) {
      breaches.push({
        resource: 'disk',
        value: disk.usedPercent,
        threshold: thresholds.disk,
        message: `Disk ${disk.mount} usage ${formatPercent(disk.usedPercent)} exceeds ${thresholds.disk}%`,
      });
    }
  }

  return breaches;
}
