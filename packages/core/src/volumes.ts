import type * as k8s from '@kubernetes/client-node';
import { InvalidVolumeError } from './errors.js';

/**
 * Check that every volume is named, that no name repeats, and that each
 * volume declares exactly one source (emptyDir, secret, configMap, ...).
 *
 * Throws InvalidVolumeError on the first offending volume.
 */
export function validateVolumes(volumes: readonly k8s.V1Volume[]): void {
  const seen = new Set<string>();
  for (const volume of volumes) {
    if (!volume.name) {
      throw new InvalidVolumeError('', 'volume name is required');
    }
    if (seen.has(volume.name)) {
      throw new InvalidVolumeError(volume.name, 'duplicate volume name');
    }
    seen.add(volume.name);

    const sources = Object.entries(volume).filter(([key, value]) => key !== 'name' && value !== undefined);
    if (sources.length !== 1) {
      const found = sources.map(([key]) => key).join(', ') || 'none';
      throw new InvalidVolumeError(volume.name, `expected exactly one volume source, found: ${found}`);
    }
  }
}
