import type { CounterSnapshot } from '../types/scanner.js';

/**
 * Run-scoped scan statistics. Probes complete on the event loop thread, so each
 * increment is applied whole; all mutation goes through these methods.
 */
export class ScanCounters {
  private hostsScannedCount = 0;
  private hostsSkippedCount = 0;
  private portsScannedCount = 0;
  private portsSkippedCount = 0;
  private portsOpenedCount = 0;
  private readonly openPortsByHost = new Map<string, number[]>();

  get hostsScanned(): number {
    return this.hostsScannedCount;
  }

  get hostsSkipped(): number {
    return this.hostsSkippedCount;
  }

  get portsScanned(): number {
    return this.portsScannedCount;
  }

  get portsSkipped(): number {
    return this.portsSkippedCount;
  }

  get portsOpened(): number {
    return this.portsOpenedCount;
  }

  hostScanned(): void {
    this.hostsScannedCount++;
  }

  hostSkipped(): void {
    this.hostsSkippedCount++;
  }

  portScanned(): void {
    this.portsScannedCount++;
  }

  portSkipped(): void {
    this.portsSkippedCount++;
  }

  portOpened(host: string, port: number): void {
    this.portsOpenedCount++;
    const ports = this.openPortsByHost.get(host);
    if (ports) {
      ports.push(port);
    } else {
      this.openPortsByHost.set(host, [port]);
    }
  }

  openPorts(host: string): number[] {
    return [...(this.openPortsByHost.get(host) ?? [])];
  }

  get activeHosts(): number {
    return this.openPortsByHost.size;
  }

  snapshot(): CounterSnapshot {
    return {
      hostsScanned: this.hostsScannedCount,
      hostsSkipped: this.hostsSkippedCount,
      portsScanned: this.portsScannedCount,
      portsSkipped: this.portsSkippedCount,
      portsOpened: this.portsOpenedCount,
      activeHosts: this.openPortsByHost.size,
    };
  }
}
