export interface ConnectionRecord {
  timestamp: string;
  local: string;
  remote: string;
}

export interface TcpListenerOptions {
  host?: string | undefined;
  resolveDns?: boolean | undefined;
  outputFile?: string | undefined;
}
