// Port scanner types

export type ProbeStatus = 'open' | 'closed' | 'excluded';

export type LineStatus = 'open' | 'closed' | 'port-excluded' | 'host-excluded';

export type LoopPolicy =
  | { kind: 'count'; passes: number }
  | { kind: 'continuous' }
  | { kind: 'until-open' }
  | { kind: 'until-closed' };

export type TerminationReason = 'completed' | 'all-open' | 'all-closed' | 'interrupted';

export type PortSpec =
  | { kind: 'list'; ports: number[] }
  | { kind: 'range'; start: number; end: number };

export interface ProbeOutcome {
  port: number;
  status: ProbeStatus;
  hostname?: string | undefined;
}

// port -> open; only ports that were actually probed
export type ScanResult = Map<number, boolean>;

/**
 * Attempts one TCP connection, resolving true when the handshake completes
 * within the timeout. Never rejects.
 */
export type PortConnector = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

/**
 * One result line. `port` is `n/a` for a skipped host; `hostname` is present
 * only when reverse DNS is on, and may be empty.
 */
export interface ResultLine {
  host: string;
  port: number | 'n/a';
  status: LineStatus;
  hostname?: string | undefined;
}

export interface ResultSink {
  emit(line: ResultLine): void;
}

export interface TcpScannerOptions {
  timeout: number;
  concurrency?: number | undefined;
  excludedPorts?: ReadonlySet<number> | undefined;
  shufflePorts?: boolean | undefined;
  showClosed?: boolean | undefined;
  verbose?: boolean | undefined;
  resolveDns?: boolean | undefined;
  connector?: PortConnector | undefined;
}

export interface CounterSnapshot {
  hostsScanned: number;
  hostsSkipped: number;
  portsScanned: number;
  portsSkipped: number;
  portsOpened: number;
  activeHosts: number;
}

export interface RunReport {
  reason: TerminationReason;
  passes: number;
  elapsedMs: number;
  counters: CounterSnapshot;
}
