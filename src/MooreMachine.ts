'use strict';

import * as _ from 'lodash';

import MachineLookupError from './MachineLookupError';
import { assertValid, outputErrors } from './parser-utils';
import { Advance, StateAutomaton } from "./StateAutomaton";
import { AutomatonType, MooreSpec, MooreTransition, OutputSymbol } from './TransitionSpec';

/**
 * Output is a function of the state alone. Every state emits, the start
 * state included, so a run over N symbols emits N + 1 outputs.
 */
export default class MooreMachine extends StateAutomaton<MooreTransition> {
  public readonly type: AutomatonType.moore = AutomatonType.moore;
  private readonly outputs: ReadonlyMap<string, OutputSymbol>;

  constructor (spec: MooreSpec) {
    super(spec);
    assertValid(outputErrors(spec));

    this.outputs = new Map(_.toPairs(spec.outputs));
  }

  /**
   * @throws MachineLookupError when the table has no entry for the pair.
   */
  public step (state: string, symbol: string): string {
    return this.transitionFor(state, symbol).to;
  }

  /**
   * @throws MachineLookupError for a state without an output.
   */
  public outputOf (state: string): OutputSymbol {
    let output = this.outputs.get(state);
    if (output === undefined)
      throw new MachineLookupError(state);
    return output;
  }

  public initialOutput (): string {
    return this.outputOf(this.start);
  }

  public advance (state: string, symbol: string): Advance {
    let next = this.step(state, symbol);
    return { next: next, output: this.outputOf(next) };
  }
}
