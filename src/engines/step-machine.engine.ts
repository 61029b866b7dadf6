import StateMachine from 'javascript-state-machine';
import { InvalidStepGraphError } from '../errors/invalid-step-graph.error';
import { isStepId, type StepId } from '../definitions/shipment-steps';
import type { StepGraph, StepNode } from '../interfaces/step-graph.interface';
import { validateStepGraph } from '../utils/validate-step-graph';

interface CompiledEdge {
  name: string;
  from: StepId;
  to: StepId;
}

const ROLLBACK_EDGE = '__rollback__';

function edgeKey(from: StepId, edge: string): string {
  return `${from}|${edge}`;
}

/**
 * Compiles a step graph into javascript-state-machine transitions and answers
 * "where does edge X lead from step Y". One machine is parked on each step at
 * startup; a move is allowed only if that machine accepts the transition, so
 * a move that is not in the graph cannot happen.
 */
export class StepMachine {
  private readonly compiled = new Map<string, CompiledEdge>();
  private readonly machines = new Map<StepId, StateMachine>();

  constructor(private readonly graph: StepGraph) {
    validateStepGraph(graph);
    const transitions = this.buildCompiledTransitions();

    for (const step of Object.keys(graph.nodes)) {
      if (isStepId(step)) {
        this.machines.set(step, new StateMachine({ init: step, transitions }));
      }
    }
  }

  get id(): string {
    return this.graph.id;
  }

  get initial(): StepId {
    return this.graph.initial;
  }

  getNode(step: StepId): StepNode {
    return this.graph.nodes[step];
  }

  edgesFrom(step: StepId): string[] {
    return Object.keys(this.graph.nodes[step].edges);
  }

  isFinal(step: StepId): boolean {
    return Boolean(this.graph.nodes[step].final);
  }

  /** Target of a forward edge. Throws if the edge is not declared on the step. */
  transition(from: StepId, edge: string): StepId {
    return this.run(from, edge);
  }

  /** Statically defined predecessor of a step. */
  rollbackTarget(from: StepId): StepId {
    return this.run(from, ROLLBACK_EDGE);
  }

  private run(from: StepId, edge: string): StepId {
    const compiled = this.compiled.get(edgeKey(from, edge));
    if (!compiled) {
      throw new InvalidStepGraphError(
        this.graph.id,
        `step "${from}" has no edge "${edge}"`,
      );
    }

    // `can` never moves the parked machine.
    if (!this.machines.get(from)?.can(compiled.name)) {
      throw new InvalidStepGraphError(
        this.graph.id,
        `transition ${compiled.name} is not allowed from "${from}"`,
      );
    }
    return compiled.to;
  }

  private buildCompiledTransitions(): CompiledEdge[] {
    const transitions: CompiledEdge[] = [];

    const add = (from: StepId, edge: string, to: StepId): void => {
      const compiled = { name: `tr${transitions.length}`, from, to };
      this.compiled.set(edgeKey(from, edge), compiled);
      transitions.push(compiled);
    };

    for (const node of Object.values(this.graph.nodes)) {
      for (const [edge, target] of Object.entries(node.edges)) {
        add(node.id, edge, target);
      }
      add(node.id, ROLLBACK_EDGE, node.rollback);
    }
    return transitions;
  }
}
