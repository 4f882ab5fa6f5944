import * as _ from 'lodash';

import MachineLookupError from './MachineLookupError';
import { assertValid, flattenTable, tableErrors } from './parser-utils';
import {
  ALPHABET,
  AutomatonType,
  InputSymbol,
  MachineSpecBase,
  OutputSymbol,
  Transition,
} from "./TransitionSpec";

export interface Advance {
  next: string;
  output: OutputSymbol;
}

export type TransitionLUT<T extends Transition> = ReadonlyMap<string, ReadonlyMap<string, T>>;

function buildLUT<T extends Transition> (transitions: ReadonlyArray<T>): TransitionLUT<T> {
  let lut = new Map<string, Map<string, T>>();
  _.forEach(transitions, (trans) => {
    let row = lut.get(trans.from) || new Map<string, T>();
    row.set(trans.read, trans);
    lut.set(trans.from, row);
  });
  return lut;
}

/**
 * A deterministic machine over the binary alphabet, stepped one symbol at a
 * time. Tables are checked for totality on construction and never change
 * afterwards.
 */
export abstract class StateAutomaton<T extends Transition> {
  public abstract readonly type: AutomatonType;
  public readonly title: string;
  public readonly description: string;
  public readonly start: string;
  public readonly states: ReadonlyArray<string>;
  public readonly alphabet: ReadonlyArray<InputSymbol> = ALPHABET;
  /** Transitions in document order: by state, then by symbol. */
  public readonly transitions: ReadonlyArray<T>;
  private readonly lut: TransitionLUT<T>;

  protected constructor (spec: MachineSpecBase<T>) {
    assertValid(tableErrors(spec));

    this.title = spec.title;
    this.description = spec.description;
    this.start = spec.startState;
    this.states = Object.freeze(_.clone(spec.states));
    let transitions = _.map(flattenTable(spec.table), (trans) => _.clone(trans));
    _.forEach(transitions, (trans) => { Object.freeze(trans); });
    this.transitions = Object.freeze(transitions);
    this.lut = buildLUT(this.transitions);
  }

  protected transitionFor (state: string, symbol: string): T {
    let row = this.lut.get(state);
    let transition = row && row.get(symbol);
    if (transition === undefined)
      throw new MachineLookupError(state, symbol);
    return transition;
  }

  /** Output emitted before any input is read. */
  public abstract initialOutput (): string;

  /** One simulation step: the state reached and the output emitted on the way. */
  public abstract advance (state: string, symbol: string): Advance;

  public toString (): string {
    return this.title || this.type;
  }
}
