import {
  SHIPMENT_STEP_GRAPH,
  isSkipInput,
} from '../../src/definitions/shipment-step-graph';
import type { StepId } from '../../src/definitions/shipment-steps';
import { ValidationError } from '../../src/errors/validation.error';
import type { Quote } from '../../src/interfaces/collaborators.interface';
import type { ShipmentFields } from '../../src/interfaces/session-records.interface';

function parseAt(step: StepId, raw: string, fields: ShipmentFields = {}) {
  const parse = SHIPMENT_STEP_GRAPH.nodes[step].parse;
  if (!parse) {
    throw new Error(`${step} accepts no input`);
  }
  return parse(raw, fields);
}

const quotes: Quote[] = [
  { id: 'usps-priority', carrier: 'USPS', service: 'Priority', amount: 8.25, currency: 'USD', estimatedDays: 3 },
  { id: 'ups-ground', carrier: 'UPS', service: 'Ground', amount: 12.5, currency: 'USD', estimatedDays: 5 },
];

describe('SHIPMENT_STEP_GRAPH', () => {
  it('should recognize skip inputs', () => {
    expect(isSkipInput(' Skip ')).toBe(true);
    expect(isSkipInput('/SKIP')).toBe(true);
    expect(isSkipInput('-')).toBe(true);
    expect(isSkipInput('skipper')).toBe(false);
  });

  it('should begin on any input at START', () => {
    expect(parseAt('START', 'hello')).toEqual({ edge: 'begin', patch: {} });
  });

  it('should store validated values under the declared key', () => {
    expect(parseAt('FROM_STATE', 'ca')).toEqual({
      edge: 'submit',
      patch: { fromState: 'CA' },
    });
    expect(parseAt('PARCEL_LENGTH', '12.5')).toEqual({
      edge: 'submit',
      patch: { parcelLength: 12.5 },
    });
  });

  it('should store the null sentinel when an optional field is skipped', () => {
    expect(parseAt('FROM_ADDRESS2', 'skip')).toEqual({
      edge: 'skip',
      patch: { fromAddress2: null },
    });
    expect(parseAt('TO_PHONE', '-')).toEqual({
      edge: 'skip',
      patch: { toPhone: null },
    });
    expect(parseAt('TO_PHONE', '2125550123')).toEqual({
      edge: 'submit',
      patch: { toPhone: '+12125550123' },
    });
  });

  it('should surface validator errors', () => {
    expect(() => parseAt('FROM_ZIP', 'abc')).toThrow(ValidationError);
  });

  it('should accept confirmation commands', () => {
    expect(parseAt('CONFIRM_DATA', ' Confirm ')).toEqual({
      edge: 'confirm',
      patch: {},
    });
    expect(parseAt('CONFIRM_DATA', 'edit_parcel').edge).toBe('edit_parcel');
    expect(() => parseAt('CONFIRM_DATA', 'yes')).toThrow(
      'Confirm the shipment or choose what to edit',
    );
  });

  describe('CARRIER_SELECTION', () => {
    it('should select by 1-based position', () => {
      expect(parseAt('CARRIER_SELECTION', '2', { quotes })).toEqual({
        edge: 'select',
        patch: { selectedQuote: quotes[1] },
      });
    });

    it('should select by quote id', () => {
      expect(
        parseAt('CARRIER_SELECTION', 'usps-priority', { quotes }).patch,
      ).toEqual({ selectedQuote: quotes[0] });
    });

    it('should reject out-of-range choices', () => {
      expect(() => parseAt('CARRIER_SELECTION', '3', { quotes })).toThrow(
        'Choose a carrier between 1 and 2',
      );
      expect(() => parseAt('CARRIER_SELECTION', '0', { quotes })).toThrow(
        'Choose a carrier between 1 and 2',
      );
    });

    it('should explain when no rates are loaded', () => {
      expect(() => parseAt('CARRIER_SELECTION', '1')).toThrow(
        'No carrier rates are available. Refresh the rates or go back',
      );
    });

    it('should accept refresh and back', () => {
      expect(parseAt('CARRIER_SELECTION', 'REFRESH').edge).toBe('refresh');
      expect(parseAt('CARRIER_SELECTION', 'back').edge).toBe('back');
    });
  });

  it('should accept payment methods', () => {
    expect(parseAt('PAYMENT_METHOD', 'Balance')).toEqual({
      edge: 'pay',
      patch: { paymentMethod: 'balance' },
    });
    expect(parseAt('PAYMENT_METHOD', 'back')).toEqual({
      edge: 'back',
      patch: {},
    });
    expect(() => parseAt('PAYMENT_METHOD', 'card')).toThrow(
      'Choose to pay from balance or by invoice',
    );
  });

  it('should give terminal steps no input contract', () => {
    expect(SHIPMENT_STEP_GRAPH.nodes.COMPLETED.parse).toBeUndefined();
    expect(SHIPMENT_STEP_GRAPH.nodes.CANCELLED.parse).toBeUndefined();
  });
});
