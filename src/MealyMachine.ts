'use strict';

import { Advance, StateAutomaton } from "./StateAutomaton";
import { AutomatonType, MealySpec, MealyTransition } from './TransitionSpec';

/**
 * Output depends on the current state and the symbol read; it is emitted
 * per transition, so nothing is emitted before the first symbol.
 */
export default class MealyMachine extends StateAutomaton<MealyTransition> {
  public readonly type: AutomatonType.mealy = AutomatonType.mealy;

  constructor (spec: MealySpec) {
    super(spec);
  }

  /**
   * @throws MachineLookupError when the table has no entry for the pair.
   */
  public step (state: string, symbol: string): Advance {
    let instruct = this.transitionFor(state, symbol);
    return { next: instruct.to, output: instruct.write };
  }

  public initialOutput (): string {
    return '';
  }

  public advance (state: string, symbol: string): Advance {
    return this.step(state, symbol);
  }
}
