import { describe, expect, it } from 'vitest';
import { getDefaultPortSpec, getDefaultPorts, loadDefaultProfile } from './port-profiles.js';
import { resolvePortSpec } from './port-spec.js';

describe('default port profile', () => {
  it('loads the common ports', () => {
    const profile = loadDefaultProfile();

    expect(profile.name).toBe('common');
    expect(profile.ports).toContain(22);
    expect(profile.ports).toContain(443);
    expect(new Set(profile.ports).size).toBe(profile.ports.length);
  });

  it('round-trips through the port specification parser', () => {
    expect(resolvePortSpec(getDefaultPortSpec())).toEqual(getDefaultPorts());
  });

  it('hands out a copy of the port list', () => {
    getDefaultPorts().length = 0;
    expect(getDefaultPorts().length).toBe(loadDefaultProfile().ports.length);
  });
});
