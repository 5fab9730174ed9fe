export class ScanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// Malformed port or skip-port specification
export class InvalidSpecError extends ScanError {
  readonly spec: string;

  constructor(spec: string, reason: string) {
    super(`Invalid port specification "${spec}": ${reason}`);
    this.spec = spec;
  }
}

// Target or excluded network that is not a usable IPv4 address or network
export class InvalidTargetError extends ScanError {
  readonly target: string;

  constructor(target: string, reason: string) {
    super(`Invalid target "${target}": ${reason}`);
    this.target = target;
  }
}

export class UnresolvableHostError extends ScanError {
  readonly hostname: string;

  constructor(hostname: string, cause?: unknown) {
    const detail = cause instanceof Error ? ` (${cause.message})` : '';
    super(`Unable to resolve hostname: ${hostname}${detail}`);
    this.hostname = hostname;
  }
}

export class ConfigError extends ScanError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
