import { ValidationError } from '../errors/validation.error';
import type {
  ShipmentFieldKey,
  ShipmentFields,
} from '../interfaces/session-records.interface';
import type { StepGraph, StepNode } from '../interfaces/step-graph.interface';
import type { StepId } from './shipment-steps';
import {
  validateAddress,
  validateCity,
  validateDimension,
  validateName,
  validatePhone,
  validateStateCode,
  validateWeight,
  validateZip,
} from '../utils/field-validators';

const SKIP_INPUTS: ReadonlySet<string> = new Set(['skip', '/skip', '-']);

export function isSkipInput(rawInput: string): boolean {
  return SKIP_INPUTS.has(rawInput.trim().toLowerCase());
}

function defineStep<K extends ShipmentFieldKey>(node: StepNode<K>): StepNode {
  return node;
}

/** Single required field, one `submit` edge. */
function fieldStep<K extends ShipmentFieldKey>(
  id: StepId,
  key: K,
  next: StepId,
  rollback: StepId,
  toPatch: (raw: string) => Pick<ShipmentFields, K>,
): StepNode {
  return defineStep<K>({
    id,
    promptKey: `prompt.${id.toLowerCase()}`,
    writes: [key],
    parse: (raw) => ({ edge: 'submit', patch: toPatch(raw) }),
    edges: { submit: next },
    rollback,
  });
}

/** Optional field: `skip` stores the null sentinel, `submit` the parsed value. */
function optionalFieldStep<K extends ShipmentFieldKey>(
  id: StepId,
  key: K,
  next: StepId,
  rollback: StepId,
  skipPatch: Pick<ShipmentFields, K>,
  toPatch: (raw: string) => Pick<ShipmentFields, K>,
): StepNode {
  return defineStep<K>({
    id,
    promptKey: `prompt.${id.toLowerCase()}`,
    writes: [key],
    parse: (raw) =>
      isSkipInput(raw)
        ? { edge: 'skip', patch: skipPatch }
        : { edge: 'submit', patch: toPatch(raw) },
    edges: { submit: next, skip: next },
    rollback,
  });
}

function selectQuote(raw: string, fields: ShipmentFields) {
  const quotes = fields.quotes ?? [];
  const input = raw.trim();

  if (/^\d+$/.test(input)) {
    const quote = quotes[Number(input) - 1];
    if (quote) return quote;
  }

  const byId = quotes.find((quote) => quote.id === input);
  if (byId) return byId;

  throw new ValidationError(
    'selectedQuote',
    quotes.length === 0
      ? 'No carrier rates are available. Refresh the rates or go back'
      : `Choose a carrier between 1 and ${quotes.length}`,
  );
}

export const SHIPMENT_STEP_GRAPH: StepGraph = {
  id: 'shipment-order',
  initial: 'START',
  nodes: {
    START: defineStep({
      id: 'START',
      promptKey: 'prompt.start',
      writes: [],
      parse: () => ({ edge: 'begin', patch: {} }),
      edges: { begin: 'FROM_NAME' },
      rollback: 'START',
    }),

    FROM_NAME: fieldStep(
      'FROM_NAME',
      'fromName',
      'FROM_ADDRESS',
      'START',
      (raw) => ({ fromName: validateName(raw, 'fromName') }),
    ),
    FROM_ADDRESS: fieldStep(
      'FROM_ADDRESS',
      'fromAddress',
      'FROM_ADDRESS2',
      'FROM_NAME',
      (raw) => ({ fromAddress: validateAddress(raw, 'fromAddress') }),
    ),
    FROM_ADDRESS2: optionalFieldStep(
      'FROM_ADDRESS2',
      'fromAddress2',
      'FROM_CITY',
      'FROM_ADDRESS',
      { fromAddress2: null },
      (raw) => ({ fromAddress2: validateAddress(raw, 'fromAddress2') }),
    ),
    FROM_CITY: fieldStep(
      'FROM_CITY',
      'fromCity',
      'FROM_STATE',
      'FROM_ADDRESS2',
      (raw) => ({ fromCity: validateCity(raw, 'fromCity') }),
    ),
    FROM_STATE: fieldStep(
      'FROM_STATE',
      'fromState',
      'FROM_ZIP',
      'FROM_CITY',
      (raw) => ({ fromState: validateStateCode(raw, 'fromState') }),
    ),
    FROM_ZIP: fieldStep(
      'FROM_ZIP',
      'fromZip',
      'FROM_PHONE',
      'FROM_STATE',
      (raw) => ({ fromZip: validateZip(raw, 'fromZip') }),
    ),
    FROM_PHONE: optionalFieldStep(
      'FROM_PHONE',
      'fromPhone',
      'TO_NAME',
      'FROM_ZIP',
      { fromPhone: null },
      (raw) => ({ fromPhone: validatePhone(raw, 'fromPhone') }),
    ),

    TO_NAME: fieldStep(
      'TO_NAME',
      'toName',
      'TO_ADDRESS',
      'FROM_PHONE',
      (raw) => ({ toName: validateName(raw, 'toName') }),
    ),
    TO_ADDRESS: fieldStep(
      'TO_ADDRESS',
      'toAddress',
      'TO_ADDRESS2',
      'TO_NAME',
      (raw) => ({ toAddress: validateAddress(raw, 'toAddress') }),
    ),
    TO_ADDRESS2: optionalFieldStep(
      'TO_ADDRESS2',
      'toAddress2',
      'TO_CITY',
      'TO_ADDRESS',
      { toAddress2: null },
      (raw) => ({ toAddress2: validateAddress(raw, 'toAddress2') }),
    ),
    TO_CITY: fieldStep(
      'TO_CITY',
      'toCity',
      'TO_STATE',
      'TO_ADDRESS2',
      (raw) => ({ toCity: validateCity(raw, 'toCity') }),
    ),
    TO_STATE: fieldStep(
      'TO_STATE',
      'toState',
      'TO_ZIP',
      'TO_CITY',
      (raw) => ({ toState: validateStateCode(raw, 'toState') }),
    ),
    TO_ZIP: fieldStep(
      'TO_ZIP',
      'toZip',
      'TO_PHONE',
      'TO_STATE',
      (raw) => ({ toZip: validateZip(raw, 'toZip') }),
    ),
    TO_PHONE: optionalFieldStep(
      'TO_PHONE',
      'toPhone',
      'PARCEL_WEIGHT',
      'TO_ZIP',
      { toPhone: null },
      (raw) => ({ toPhone: validatePhone(raw, 'toPhone') }),
    ),

    PARCEL_WEIGHT: fieldStep(
      'PARCEL_WEIGHT',
      'parcelWeight',
      'PARCEL_LENGTH',
      'TO_PHONE',
      (raw) => ({ parcelWeight: validateWeight(raw, 'parcelWeight') }),
    ),
    PARCEL_LENGTH: fieldStep(
      'PARCEL_LENGTH',
      'parcelLength',
      'PARCEL_WIDTH',
      'PARCEL_WEIGHT',
      (raw) => ({
        parcelLength: validateDimension(raw, 'parcelLength', 'Length'),
      }),
    ),
    PARCEL_WIDTH: fieldStep(
      'PARCEL_WIDTH',
      'parcelWidth',
      'PARCEL_HEIGHT',
      'PARCEL_LENGTH',
      (raw) => ({
        parcelWidth: validateDimension(raw, 'parcelWidth', 'Width'),
      }),
    ),
    PARCEL_HEIGHT: fieldStep(
      'PARCEL_HEIGHT',
      'parcelHeight',
      'CONFIRM_DATA',
      'PARCEL_WIDTH',
      (raw) => ({
        parcelHeight: validateDimension(raw, 'parcelHeight', 'Height'),
      }),
    ),

    CONFIRM_DATA: defineStep({
      id: 'CONFIRM_DATA',
      promptKey: 'prompt.confirm_data',
      writes: [],
      parse: (raw) => {
        const command = raw.trim().toLowerCase();
        if (
          command === 'confirm' ||
          command === 'edit_from' ||
          command === 'edit_to' ||
          command === 'edit_parcel'
        ) {
          return { edge: command, patch: {} };
        }
        throw new ValidationError(
          'command',
          'Confirm the shipment or choose what to edit',
        );
      },
      edges: {
        confirm: 'CARRIER_SELECTION',
        edit_from: 'FROM_NAME',
        edit_to: 'TO_NAME',
        edit_parcel: 'PARCEL_WEIGHT',
      },
      rollback: 'PARCEL_HEIGHT',
    }),

    CARRIER_SELECTION: defineStep<'selectedQuote'>({
      id: 'CARRIER_SELECTION',
      promptKey: 'prompt.carrier_selection',
      writes: ['selectedQuote'],
      parse: (raw, fields) => {
        const command = raw.trim().toLowerCase();
        if (command === 'refresh' || command === 'back') {
          return { edge: command, patch: {} };
        }
        return {
          edge: 'select',
          patch: { selectedQuote: selectQuote(raw, fields) },
        };
      },
      edges: {
        select: 'PAYMENT_METHOD',
        refresh: 'CARRIER_SELECTION',
        back: 'CONFIRM_DATA',
      },
      rollback: 'CONFIRM_DATA',
      entry: 'load-quotes',
    }),

    PAYMENT_METHOD: defineStep<'paymentMethod'>({
      id: 'PAYMENT_METHOD',
      promptKey: 'prompt.payment_method',
      writes: ['paymentMethod'],
      parse: (raw) => {
        const command = raw.trim().toLowerCase();
        if (command === 'back') {
          return { edge: 'back', patch: {} };
        }
        if (command === 'balance' || command === 'invoice') {
          return { edge: 'pay', patch: { paymentMethod: command } };
        }
        throw new ValidationError(
          'paymentMethod',
          'Choose to pay from balance or by invoice',
        );
      },
      edges: { pay: 'COMPLETED', back: 'CARRIER_SELECTION' },
      rollback: 'CARRIER_SELECTION',
    }),

    COMPLETED: defineStep({
      id: 'COMPLETED',
      promptKey: 'prompt.completed',
      writes: [],
      edges: {},
      rollback: 'PAYMENT_METHOD',
      entry: 'checkout',
      final: true,
    }),

    CANCELLED: defineStep({
      id: 'CANCELLED',
      promptKey: 'prompt.cancelled',
      writes: [],
      edges: {},
      rollback: 'START',
      final: true,
    }),
  },
};
