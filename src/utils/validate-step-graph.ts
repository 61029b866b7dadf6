import { InvalidStepGraphError } from '../errors/invalid-step-graph.error';
import { isStepId } from '../definitions/shipment-steps';
import type { StepGraph } from '../interfaces/step-graph.interface';

function assertTargetExists(
  graph: StepGraph,
  target: string,
  stepName: string,
  edge: string,
): void {
  if (!isStepId(target) || !(target in graph.nodes)) {
    throw new InvalidStepGraphError(
      graph.id,
      `step "${stepName}" edge "${edge}" targets unknown step "${target}"`,
    );
  }
}

export function validateStepGraph(graph: StepGraph): void {
  if (!graph.id || typeof graph.id !== 'string') {
    throw new InvalidStepGraphError(
      String(graph.id),
      'id must be a non-empty string',
    );
  }

  if (!(graph.initial in graph.nodes)) {
    throw new InvalidStepGraphError(
      graph.id,
      `initial step "${graph.initial}" does not exist`,
    );
  }

  for (const [stepName, node] of Object.entries(graph.nodes)) {
    if (node.id !== stepName) {
      throw new InvalidStepGraphError(
        graph.id,
        `node registered as "${stepName}" declares id "${node.id}"`,
      );
    }

    assertTargetExists(graph, node.rollback, stepName, 'rollback');

    const edges = Object.entries(node.edges);
    for (const [edge, target] of edges) {
      assertTargetExists(graph, target, stepName, edge);
    }

    if (node.final) {
      if (edges.length > 0 || node.parse) {
        throw new InvalidStepGraphError(
          graph.id,
          `final step "${stepName}" cannot accept input or declare edges`,
        );
      }
      continue;
    }

    if (!node.parse || edges.length === 0) {
      throw new InvalidStepGraphError(
        graph.id,
        `step "${stepName}" needs an input contract and at least one edge`,
      );
    }
  }
}
