import { randomUUID } from 'crypto';

/** Format: ORD-<yyyyMMddHHmmss UTC>-<8 hex chars> */
export function generateOrderCorrelationId(
  now?: Date,
  prefix = 'ORD',
): string {
  const timestamp = (now ?? new Date())
    .toISOString()
    .replace(/[-:T]/g, '')
    .slice(0, 14);
  return `${prefix}-${timestamp}-${randomUUID().slice(0, 8)}`;
}
