import * as _ from 'lodash';

import MealyMachine from '../MealyMachine';
import MooreMachine from '../MooreMachine';
import StateGraph from '../state-diagram/StateGraph';

const RULE = _.repeat('=', 22);

/**
 * Text diagram of a machine: a banner, its description and one line per edge,
 * e.g. `A (start) ──0/b──▶ B`.
 */
export function renderDiagram (machine: MealyMachine | MooreMachine): string[] {
  let graph = new StateGraph(machine);
  let width = _.max(_.map(graph.getVertices(), (vertex) => vertex.label.length)) || 0;

  let edges = _.map(graph.getEdges(), (edge) =>
    '  ' + _.padEnd(edge.source.label, width) +
    ' ──' + edge.labels.join(',') + '──▶ ' + edge.target.label);

  let legend = machine instanceof MealyMachine
    ? ['', '(Transitions are labeled as input/output)']
    : [];

  return _.concat(
    ['', RULE, '   ' + machine.toString(), RULE],
    machine.description ? ['', machine.description] : [],
    [''],
    edges,
    legend,
  );
}
