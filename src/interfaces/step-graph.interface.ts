import type { StepId } from '../definitions/shipment-steps';
import type {
  ShipmentFieldKey,
  ShipmentFields,
} from './session-records.interface';

/**
 * Accepted input. `edge` names the outgoing edge to follow; `patch` may only
 * carry the keys the node declares in `writes`.
 */
export interface StepAcceptance<K extends ShipmentFieldKey> {
  edge: string;
  patch: Pick<ShipmentFields, K>;
}

/** Side effect the controller runs when a node is entered. */
export type StepEffect = 'load-quotes' | 'checkout';

export interface StepNode<K extends ShipmentFieldKey = ShipmentFieldKey> {
  id: StepId;
  promptKey: string;
  writes: readonly K[];
  /**
   * Input contract. Throws ValidationError to reject the input; the session
   * then stays on this node.
   */
  parse?: (rawInput: string, fields: ShipmentFields) => StepAcceptance<K>;
  /** Outgoing edges by name, e.g. `submit`, `skip`, `edit_from`. */
  edges: Readonly<Record<string, StepId>>;
  /** Predecessor used for error recovery. */
  rollback: StepId;
  entry?: StepEffect;
  final?: boolean;
}

export interface StepGraph {
  id: string;
  initial: StepId;
  nodes: Readonly<Record<StepId, StepNode>>;
}
