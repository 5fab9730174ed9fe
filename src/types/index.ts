// Scanner types
export type {
  ProbeStatus,
  LineStatus,
  LoopPolicy,
  TerminationReason,
  PortSpec,
  ProbeOutcome,
  ScanResult,
  PortConnector,
  ResultLine,
  ResultSink,
  TcpScannerOptions,
  CounterSnapshot,
  RunReport,
} from './scanner.js';

// Listener types
export type {
  ConnectionRecord,
  TcpListenerOptions,
} from './listener.js';
