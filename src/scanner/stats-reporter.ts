import type { ScanCounters } from './counters.js';
import type { DiagnosticLogger } from '../utils/logger.js';

export interface StatsReporterOptions {
  intervalSeconds: number;
  now?: (() => number) | undefined;
}

/**
 * Periodically logs cumulative hosts/ports scanned and the port rate since the
 * previous report. Reads the counters, never writes them. Only one timer is
 * ever pending; `stop()` or aborting the start signal cancels it.
 */
export class StatsReporter {
  private readonly intervalMs: number;
  private readonly counters: ScanCounters;
  private readonly logger: DiagnosticLogger;
  private readonly now: () => number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private lastPortCount = 0;
  private lastTimestamp = 0;
  private signal: AbortSignal | null = null;
  private readonly onAbort = (): void => this.stop();

  constructor(counters: ScanCounters, logger: DiagnosticLogger, options: StatsReporterOptions) {
    if (!(options.intervalSeconds > 0)) {
      throw new RangeError(`Stats interval must be positive, got ${options.intervalSeconds}`);
    }
    this.intervalMs = options.intervalSeconds * 1000;
    this.counters = counters;
    this.logger = logger;
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(signal?: AbortSignal): void {
    if (this.timer || signal?.aborted) return;

    this.lastPortCount = this.counters.portsScanned;
    this.lastTimestamp = this.now();
    if (signal) {
      this.signal = signal;
      signal.addEventListener('abort', this.onAbort, { once: true });
    }
    this.schedule();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.signal) {
      this.signal.removeEventListener('abort', this.onAbort);
      this.signal = null;
    }
  }

  /**
   * Emit a report now, regardless of the schedule
   */
  flush(): void {
    this.report(true);
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.report(false);
      if (this.timer) {
        this.schedule();
      }
    }, this.intervalMs);
  }

  private report(force: boolean): void {
    const portsScanned = this.counters.portsScanned;
    if (!force && portsScanned === 0) return;

    const timestamp = this.now();
    const elapsedSeconds = Math.max((timestamp - this.lastTimestamp) / 1000, 1);
    const rate = Math.floor((portsScanned - this.lastPortCount) / elapsedSeconds);

    this.logger.info(`hosts:${this.counters.hostsScanned}\tports:${portsScanned}\tports/sec:${rate}`);

    this.lastPortCount = portsScanned;
    this.lastTimestamp = timestamp;
  }
}
