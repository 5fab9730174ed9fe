import {
  enumerateHosts,
  parseExcludedNetwork,
  type ForwardResolver,
} from './host-enumerator.js';
import { getDefaultPortSpec } from './port-profiles.js';
import { buildExcludedPorts, resolvePortSpec } from './port-spec.js';
import type { Ipv4Network } from '../utils/ip-utils.js';
import type { ScanConfig } from '../schemas/config.js';

export interface ScanPlan {
  hosts: string[];
  ports: number[];
  excludedPorts: Set<number>;
  excludedNetwork: Ipv4Network | null;
}

/**
 * Resolve every target and port expression of the configuration. All
 * configuration errors surface here, before any connection is attempted.
 */
export async function createScanPlan(config: ScanConfig, resolver?: ForwardResolver): Promise<ScanPlan> {
  const ports = resolvePortSpec(config.ports ?? getDefaultPortSpec());
  const excludedPorts = buildExcludedPorts(config.skipPorts);
  const excludedNetwork = parseExcludedNetwork(config.skipNetwork);
  const hosts = await enumerateHosts(config.target, {
    shuffle: config.shuffleHosts,
    resolver,
  });

  return { hosts, ports, excludedPorts, excludedNetwork };
}
