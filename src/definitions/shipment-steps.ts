export const SHIPMENT_STEPS = [
  'START',
  'FROM_NAME',
  'FROM_ADDRESS',
  'FROM_ADDRESS2',
  'FROM_CITY',
  'FROM_STATE',
  'FROM_ZIP',
  'FROM_PHONE',
  'TO_NAME',
  'TO_ADDRESS',
  'TO_ADDRESS2',
  'TO_CITY',
  'TO_STATE',
  'TO_ZIP',
  'TO_PHONE',
  'PARCEL_WEIGHT',
  'PARCEL_LENGTH',
  'PARCEL_WIDTH',
  'PARCEL_HEIGHT',
  'CONFIRM_DATA',
  'CARRIER_SELECTION',
  'PAYMENT_METHOD',
  'COMPLETED',
  'CANCELLED',
] as const;

export type StepId = (typeof SHIPMENT_STEPS)[number];

export const INITIAL_STEP: StepId = 'START';

/** A session seeded from a template already has both addresses. */
export const TEMPLATE_ENTRY_STEP: StepId = 'PARCEL_WEIGHT';

export const TERMINAL_STEPS: ReadonlySet<StepId> = new Set<StepId>([
  'COMPLETED',
  'CANCELLED',
]);

const STEP_IDS: ReadonlySet<string> = new Set(SHIPMENT_STEPS);

export function isStepId(value: unknown): value is StepId {
  return typeof value === 'string' && STEP_IDS.has(value);
}

export function isTerminalStep(step: StepId): boolean {
  return TERMINAL_STEPS.has(step);
}
