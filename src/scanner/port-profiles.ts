import fs from 'fs';
import { z } from 'zod';

const PortProfileSchema = z.object({
  name: z.string(),
  description: z.string(),
  ports: z.array(z.number().int().min(1).max(65535)).nonempty(),
});

export type PortProfile = z.infer<typeof PortProfileSchema>;

const DEFAULT_PROFILE_URL = new URL('../../data/default-ports.json', import.meta.url);

let cachedProfile: PortProfile | null = null;

// Ports scanned when no port specification is given
export function loadDefaultProfile(): PortProfile {
  if (!cachedProfile) {
    const raw: unknown = JSON.parse(fs.readFileSync(DEFAULT_PROFILE_URL, 'utf8'));
    cachedProfile = PortProfileSchema.parse(raw);
  }
  return cachedProfile;
}

export function getDefaultPorts(): number[] {
  return [...loadDefaultProfile().ports];
}

/**
 * The default profile as a comma-list port specification
 */
export function getDefaultPortSpec(): string {
  return loadDefaultProfile().ports.join(',');
}
