import { InvalidSpecError } from '../utils/errors.js';
import type { PortSpec } from '../types/scanner.js';

export const MIN_PORT = 1;
export const MAX_PORT = 65535;

const INTEGER_PATTERN = /^\d+$/;

function parsePort(spec: string, token: string): number {
  const trimmed = token.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    throw new InvalidSpecError(spec, `"${trimmed}" is not a port number`);
  }
  const port = parseInt(trimmed, 10);
  if (port < MIN_PORT || port > MAX_PORT) {
    throw new InvalidSpecError(spec, `port ${port} is outside ${MIN_PORT}-${MAX_PORT}`);
  }
  return port;
}

/**
 * Parse a port specification: a single port, a comma list (`22,80,443`),
 * a hyphen range (`80-515`) or `all`.
 */
export function parsePortSpec(spec: string): PortSpec {
  const trimmed = spec.trim();
  if (trimmed.toLowerCase() === 'all') {
    return { kind: 'range', start: MIN_PORT, end: MAX_PORT };
  }

  const hasRange = trimmed.includes('-');
  const hasList = trimmed.includes(',');

  if (hasRange && hasList) {
    throw new InvalidSpecError(spec, 'cannot contain both a port range and a list of ports');
  }

  if (hasRange) {
    const bounds = trimmed.split('-');
    if (bounds.length !== 2) {
      throw new InvalidSpecError(spec, 'a range takes exactly one start and one end port');
    }
    const [startToken = '', endToken = ''] = bounds;
    if (!INTEGER_PATTERN.test(startToken.trim()) || !INTEGER_PATTERN.test(endToken.trim())) {
      throw new InvalidSpecError(spec, 'range bounds must be port numbers');
    }
    const start = parseInt(startToken, 10);
    const end = parseInt(endToken, 10);
    if (end < start) {
      throw new InvalidSpecError(spec, 'ending port is less than starting port');
    }
    if (end > MAX_PORT) {
      throw new InvalidSpecError(spec, `ending port is greater than ${MAX_PORT}`);
    }
    if (start < MIN_PORT) {
      throw new InvalidSpecError(spec, `starting port is less than ${MIN_PORT}`);
    }
    return { kind: 'range', start, end };
  }

  return { kind: 'list', ports: trimmed.split(',').map((token) => parsePort(spec, token)) };
}

export function expandPortSpec(portSpec: PortSpec): number[] {
  if (portSpec.kind === 'list') {
    return [...portSpec.ports];
  }
  const ports: number[] = [];
  for (let port = portSpec.start; port <= portSpec.end; port++) {
    ports.push(port);
  }
  return ports;
}

export function resolvePortSpec(spec: string): number[] {
  return expandPortSpec(parsePortSpec(spec));
}

export function buildExcludedPorts(spec: string | undefined): Set<number> {
  if (spec === undefined || spec.trim() === '') {
    return new Set();
  }
  return new Set(resolvePortSpec(spec));
}

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= MIN_PORT && port <= MAX_PORT;
}
