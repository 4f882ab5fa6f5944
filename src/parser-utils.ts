import * as _ from "lodash";
import * as yup from "yup";

import MachineSpecError from "./MachineSpecError";
import {
  ALPHABET,
  Transition, MachineSpecBase, MooreSpec,
  TransitionTable,
} from './TransitionSpec';

export function isRecord (val: unknown): val is {[key: string]: unknown} {
  return _.isPlainObject(val);
}

/**
 * Run a yup validation, reporting its failures as a {@link MachineSpecError}.
 */
export function validated<T> (validate: () => T): T {
  try {
    return validate();
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new MachineSpecError('Validation Error', {
        validationErrors: e.errors
      });
    throw e;
  }
}

export type TransitionParser<T extends Transition> =
  (from: string, symbol: string, trans: unknown) => T[];

/**
 * Expand a document's `table` into a transition table.
 * A row key may list several symbols: `0,1` or the YAML sequence `[0, 1]`.
 */
export function parseTable<T extends Transition> (table: unknown, parser: TransitionParser<T>): TransitionTable<T> {
  if (_.isNil(table))
    return {};
  if (!isRecord(table))
    throw new MachineSpecError('Transition table must map states to transitions', {
      problemValue: table
    });

  return _.mapValues(table, (outTrans, from): {[symbol: string]: T[]} => {
    if (_.isNil(outTrans))
      return {};
    if (!isRecord(outTrans))
      throw new MachineSpecError('Transitions of state ' + from + ' must map symbols to transitions', {
        problemValue: outTrans
      });

    let row: {[symbol: string]: T[]} = {};
    _.forEach(outTrans, (trans, symbols) => {
      _.forEach(String(symbols).split(","), (symbol) => {
        symbol = _.trim(symbol);
        row[symbol] = _.concat(row[symbol] || [], parser(from, symbol, trans));
      });
    });
    return row;
  });
}

export function flattenTable<T extends Transition> (table: TransitionTable<T>): T[] {
  return _.chain(table)
    .values()
    .flatMap((stateObject) => _.flatten(_.values(stateObject)))
    .value();
}

export function undeclaredStates (spec: MachineSpecBase<Transition>): string[] {
  return _.chain(flattenTable(spec.table))
    .map((transition) => transition.to)
    .uniq()
    .difference(spec.states)
    .value();
}

export function nondeterministicTransitions<T extends Transition> (table: TransitionTable<T>): T[][] {
  let groups: T[][] = [];
  _.forEach(table, (stateObj) => {
    _.forEach(stateObj, (transs) => {
      if (transs.length > 1) groups.push(transs);
    });
  });
  return groups;
}

/** Every (state, symbol) pair of the declared states that has no transition. */
export function missingTransitions (spec: MachineSpecBase<Transition>): Array<[string, string]> {
  return _.chain(spec.states)
    .flatMap((state) =>
      _.map(ALPHABET, (symbol): [string, string] => [state, symbol]))
    .filter(([state, symbol]) =>
      _.isEmpty(_.get(spec.table, [state, symbol])))
    .value();
}

/**
 * Problems that keep a table from describing a deterministic machine that is
 * total over the declared states and the alphabet.
 */
export function tableErrors (spec: MachineSpecBase<Transition>): string[] {
  let errors: string[] = [];

  if (!_.includes(spec.states, spec.startState))
    errors.push('start state ' + spec.startState + ' must be declared');

  _.forEach(undeclaredStates(spec), (state) =>
    errors.push('state ' + state + ' must be declared'));

  _.forEach(_.keys(spec.table), (state) => {
    _.forEach(_.keys(spec.table[state]), (symbol) => {
      if (!_.includes<string>(ALPHABET, symbol))
        errors.push('symbol ' + JSON.stringify(symbol) + ' of state ' + state + ' is not in the alphabet');
    });
  });

  _.forEach(nondeterministicTransitions(spec.table), (group) =>
    errors.push('nondeterministic transitions: ' +
      _.map(group, (trans) => trans.from + '->' + trans.to + ' on ' + trans.read).join(' ; ')));

  _.forEach(missingTransitions(spec), ([state, symbol]) =>
    errors.push('no transition from state ' + state + ' on ' + symbol));

  return errors;
}

export function outputErrors (spec: MooreSpec): string[] {
  let declared = _.keys(spec.outputs);
  return _.concat(
    _.map(_.difference(spec.states, declared), (state) =>
      'no output for state ' + state),
    _.map(_.difference(declared, spec.states), (state) =>
      'output given for undeclared state ' + state),
  );
}

export function assertValid (errors: string[]): void {
  if (errors.length) throw new MachineSpecError('Validation Error', {
    validationErrors: errors
  });
}
