import net from 'net';
import { ScanCounters } from './counters.js';
import { DnsCache } from './dns-cache.js';
import { isValidPort } from './port-spec.js';
import { shuffle } from '../utils/shuffle.js';
import type {
  PortConnector,
  ProbeOutcome,
  ResultSink,
  ScanResult,
  TcpScannerOptions,
} from '../types/scanner.js';

/**
 * Check if a single TCP port accepts a connection
 */
export function checkPort(host: string, port: number, timeout: number): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new net.Socket();
    socket.setTimeout(timeout);

    socket.on('connect', () => {
      socket.destroy();
      resolve(true);
    });

    socket.on('error', () => {
      socket.destroy();
      resolve(false);
    });

    socket.on('timeout', () => {
      socket.destroy();
      resolve(false);
    });

    socket.connect(port, host);
  });
}

export class TcpScanner {
  private readonly timeout: number;
  private readonly concurrency: number;
  private readonly excludedPorts: ReadonlySet<number>;
  private readonly shufflePorts: boolean;
  private readonly showClosed: boolean;
  private readonly verbose: boolean;
  private readonly resolveDns: boolean;
  private readonly connector: PortConnector;
  private readonly counters: ScanCounters;
  private readonly sink: ResultSink;
  private readonly dnsCache: DnsCache;

  constructor(
    options: TcpScannerOptions,
    counters: ScanCounters,
    sink: ResultSink,
    dnsCache?: DnsCache
  ) {
    const concurrency = options.concurrency ?? 100;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.timeout = options.timeout;
    this.concurrency = concurrency;
    this.excludedPorts = options.excludedPorts ?? new Set();
    this.shufflePorts = options.shufflePorts ?? false;
    this.showClosed = options.showClosed ?? false;
    this.verbose = options.verbose ?? false;
    this.resolveDns = options.resolveDns ?? false;
    this.connector = options.connector ?? checkPort;
    this.counters = counters;
    this.sink = sink;
    this.dnsCache = dnsCache ?? new DnsCache({ timeout: options.timeout });
  }

  /**
   * Probe one port. Network failures of any kind classify the port closed;
   * only an out-of-range port number throws. A probe that completes after
   * `signal` aborts neither counts the port open nor emits a line.
   */
  async probe(host: string, port: number, signal?: AbortSignal): Promise<ProbeOutcome> {
    if (!isValidPort(port)) {
      throw new RangeError(`Port ${port} is outside 1-65535`);
    }

    if (this.excludedPorts.has(port)) {
      this.counters.portSkipped();
      if (this.verbose) {
        this.sink.emit({ host, port, status: 'port-excluded' });
      }
      return { port, status: 'excluded' };
    }

    this.counters.portScanned();
    const isOpen = await this.connector(host, port, this.timeout);

    if (!isOpen) {
      if (this.showClosed && !signal?.aborted) {
        this.sink.emit({ host, port, status: 'closed' });
      }
      return { port, status: 'closed' };
    }

    const hostname = this.resolveDns ? await this.dnsCache.reverse(host) : undefined;
    if (signal?.aborted) {
      return { port, status: 'open', hostname };
    }

    this.counters.portOpened(host, port);
    this.sink.emit({ host, port, status: 'open', hostname });
    return { port, status: 'open', hostname };
  }

  /**
   * Probe every port on one host through a pool of at most `concurrency`
   * workers. Aborting the signal stops the wait and returns the results
   * completed so far; probes already in flight are left to finish on their own.
   */
  async scanHost(host: string, ports: readonly number[], signal?: AbortSignal): Promise<ScanResult> {
    this.counters.hostScanned();

    const invalid = ports.find((port) => !isValidPort(port));
    if (invalid !== undefined) {
      throw new RangeError(`Port ${invalid} is outside 1-65535`);
    }

    const queue = this.shufflePorts ? shuffle([...ports]) : [...ports];
    const results: ScanResult = new Map();
    let cursor = 0;

    const workers = Array(Math.min(this.concurrency, queue.length))
      .fill(null)
      .map(async () => {
        while (cursor < queue.length && !signal?.aborted) {
          const port = queue[cursor++];
          if (port === undefined) break;
          const outcome = await this.probe(host, port, signal);
          if (outcome.status !== 'excluded') {
            results.set(outcome.port, outcome.status === 'open');
          }
        }
      });

    if (!signal) {
      await Promise.all(workers);
      return results;
    }

    let settle: () => void = () => {};
    const aborted = new Promise<void>((resolve) => {
      settle = resolve;
    });
    const onAbort = (): void => settle();

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      await Promise.race([Promise.all(workers), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    return new Map(results);
  }
}
