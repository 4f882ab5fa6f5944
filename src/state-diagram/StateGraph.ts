'use strict';

import * as _ from 'lodash';

import MealyMachine from '../MealyMachine';
import MooreMachine from '../MooreMachine';
import type { MealyTransition, MooreTransition, OutputSymbol, Transition } from '../TransitionSpec';

export interface Vertex {
  state: string,
  label: string,
  isStart: boolean,
  output?: OutputSymbol,
}

export interface Edge {
  source: Vertex,
  target: Vertex,
  labels: string[],
}

interface VertexLUT {
  [state: string]: Vertex
}

type Graph = {vertices: VertexLUT, edges: Edge[]};

/**
 * Use a machine's transitions to derive the graph (vertices & edges) of its
 * diagram. Edges with the same source and target are combined.
 */
function deriveGraph<T extends Transition> (
  states: ReadonlyArray<string>,
  transitions: ReadonlyArray<T>,
  annotate: (state: string) => Pick<Vertex, 'isStart' | 'output'>,
  labelFor: (trans: T) => string,
): Graph {
  // We need two passes, since edges may point at vertices yet to be created.
  // 1. Create all the vertices.
  let vertices: VertexLUT = {};
  _.forEach(states, (state) => {
    let notes = annotate(state);
    let marks = _.compact([notes.isStart ? 'start' : '', notes.output]);
    vertices[state] = {
      state: state,
      label: marks.length ? state + ' (' + marks.join(',') + ')' : state,
      isStart: notes.isStart,
      output: notes.output,
    };
  });

  // 2. Create the edges, which can now point at any vertex object.
  let edges: Edge[] = [];
  let cache: {[source: string]: {[target: string]: Edge}} = {};
  function edgeTo (source: string, target: string): Edge {
    let bySource = cache[source] || (cache[source] = {});
    let edge = bySource[target];
    if (edge === undefined) {
      edge = bySource[target] = {
        source: vertices[source],
        target: vertices[target],
        labels: [],
      };
      edges.push(edge);
    }
    return edge;
  }

  _.forEach(transitions, (trans) => {
    edgeTo(trans.from, trans.to).labels.push(labelFor(trans));
  });

  return {vertices: vertices, edges: edges};
}

function labelFor_Mealy (trans: MealyTransition): string {
  return trans.read + '/' + trans.write;
}

function labelFor_Moore (trans: MooreTransition): string {
  return trans.read;
}

/**
 * Vertices and edges of a machine's state diagram.
 * Mealy edges are labelled `input/output`; Moore vertices carry their output.
 */
class StateGraph {
  private readonly derived: Graph;

  constructor (machine: MealyMachine | MooreMachine) {
    let isStart = (state: string) => state === machine.start;
    if (machine instanceof MooreMachine) {
      const moore = machine;
      this.derived = deriveGraph(moore.states, moore.transitions,
        (state) => ({ isStart: isStart(state), output: moore.outputOf(state) }),
        labelFor_Moore);
    } else
      this.derived = deriveGraph(machine.states, machine.transitions,
        (state) => ({ isStart: isStart(state) }),
        labelFor_Mealy);
  }

  /**
   * Vertices in declaration order.
   */
  public getVertices (): Vertex[] {
    return _.values(this.derived.vertices);
  }

  /**
   * Edges in order of their first transition.
   */
  public getEdges (): Edge[] {
    return this.derived.edges;
  }

  public getVertex (state: string): Vertex {
    let vertex = this.derived.vertices[state];
    if (vertex === undefined) {
      throw new Error('not a valid state: ' + String(state));
    }
    return vertex;
  }
}

export default StateGraph;
