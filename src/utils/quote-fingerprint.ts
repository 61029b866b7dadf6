import { createHash } from 'crypto';
import type { ShipmentDescriptor } from '../interfaces/collaborators.interface';

/**
 * Deterministic cache key for a shipment. Weight is rounded to 0.1 lb and
 * dimensions truncated to whole inches so near-identical parcels share an entry.
 */
export function quoteFingerprint(descriptor: ShipmentDescriptor): string {
  const canonical = JSON.stringify({
    dimensions: `${Math.trunc(descriptor.length)}x${Math.trunc(descriptor.width)}x${Math.trunc(descriptor.height)}`,
    from_zip: descriptor.fromZip.trim(),
    to_zip: descriptor.toZip.trim(),
    weight: Math.round(descriptor.weight * 10) / 10,
  });
  return createHash('md5').update(canonical).digest('hex');
}
