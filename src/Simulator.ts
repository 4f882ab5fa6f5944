import * as _ from 'lodash';

import { StateAutomaton } from './StateAutomaton';
import { AutomatonType, OutputSymbol, Transition } from './TransitionSpec';

export interface TraceEntry {
  /** 1-based. */
  readonly step: number;
  readonly state: string;
  readonly input: string;
  readonly next: string;
  readonly output: OutputSymbol;
}

export interface Trace {
  readonly type: AutomatonType;
  readonly input: string;
  readonly entries: ReadonlyArray<TraceEntry>;
  /** Concatenated outputs; a Moore trace starts with the start state's output. */
  readonly output: string;
}

/**
 * Run a machine over `input` from its start state, one symbol per step,
 * left to right.
 * A symbol outside the alphabet fails the run at that step with a
 * MachineLookupError.
 */
export function simulate<T extends Transition> (machine: StateAutomaton<T>, input: string): Trace {
  let current = machine.start;
  let output = machine.initialOutput();
  let entries: TraceEntry[] = [];

  _.forEach(input.split(''), (symbol, i) => {
    let { next, output: emitted } = machine.advance(current, symbol);
    entries.push(Object.freeze({
      step: i + 1,
      state: current,
      input: symbol,
      next: next,
      output: emitted,
    }));
    output += emitted;
    current = next;
  });

  return Object.freeze({
    type: machine.type,
    input: input,
    entries: Object.freeze(entries),
    output: output,
  });
}
