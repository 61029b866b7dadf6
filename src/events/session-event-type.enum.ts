export enum SessionEventType {
  CREATED = 'session.created',
  TRANSITION = 'session.transition',
  ROLLED_BACK = 'session.rolled-back',
  CANCELLED = 'session.cancelled',
  ARCHIVED = 'session.archived',
  EXPIRED = 'session.expired',
  PAYMENT_APPLIED = 'payment.applied',
  PAYMENT_DUPLICATE = 'payment.duplicate',
  PAYMENT_REJECTED = 'payment.rejected',
}
