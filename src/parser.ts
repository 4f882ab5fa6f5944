'use strict';

import * as jsyaml from "js-yaml";
import * as _ from 'lodash';
import * as yup from 'yup';

import log from './log';
import MachineSpecError from './MachineSpecError';
import {
  isRecord,
  parseTable,
  tableErrors,
  outputErrors,
  assertValid,
  validated,
  TransitionParser,
} from './parser-utils';
import {
  AutomatonType,
  MealyTransitionSchema, MooreTransitionSchema, OutputSchema,
  MealyTransition, MooreTransition, OutputSymbol,
  MachineSpec, MealySpec, MooreSpec,
} from './TransitionSpec';

export { MachineSpecError };

// document keys accepted for the same field
const synonyms: {[key: string]: string} = {
  'start state': 'startState',
  'start': 'startState',
};

const MealyTransitionParser: TransitionParser<MealyTransition> =
  function (from, symbol, trans) {
    if (!isRecord(trans))
      throw new MachineSpecError('Mealy transition ' + from + ' on ' + symbol + ' needs a state and an output', {
        problemValue: trans
      });

    let to = trans.state, write = trans.write;
    return [transitionOf(from, symbol, () =>
      MealyTransitionSchema.validateSync({
        from: from,
        read: symbol,
        to: _.isNil(to) ? from : to,
        write: write,
      }, { abortEarly: false }))];
  };

const MooreTransitionParser: TransitionParser<MooreTransition> =
  function (from, symbol, trans) {
    let to = isRecord(trans) ? trans.state : trans;
    return [transitionOf(from, symbol, () =>
      MooreTransitionSchema.validateSync({
        from: from,
        read: symbol,
        to: _.isNil(to) ? from : to,
      }, { abortEarly: false }))];
  };

function transitionOf<T> (from: string, symbol: string, validate: () => T): T {
  try {
    return validate();
  } catch (e) {
    if (e instanceof yup.ValidationError)
      throw new MachineSpecError('Invalid transition from state ' + from + ' on ' + symbol, {
        validationErrors: e.errors
      });
    throw e;
  }
}

let headerSchema = yup.object({
  type: yup
    .mixed<AutomatonType>()
    .required('type is required')
    .oneOf(
      Object.values(AutomatonType),
      'Automaton must be of type ' + JSON.stringify(Object.values(AutomatonType))
    ),
  title: yup.string().default(''),
  description: yup.string().default(''),
  startState: yup.string().required('start state is required'),
});

function parseOutputs (outputs: unknown): {[state: string]: OutputSymbol} {
  if (_.isNil(outputs))
    return {};
  if (!isRecord(outputs))
    throw new MachineSpecError('Moore outputs must map states to output symbols', {
      problemValue: outputs
    });

  return _.mapValues(outputs, (output) =>
    validated(() => OutputSchema.validateSync(output, { abortEarly: false }))
  );
}

function loadDocument (str: string): {[key: string]: unknown} {
  let obj: unknown;
  try {
    obj = jsyaml.load(str);
  } catch (e) {
    if (e instanceof jsyaml.YAMLException)
      throw new MachineSpecError('YAML Error', { problemValue: e.message });
    throw e;
  }
  if (obj == null) obj = {};
  if (!isRecord(obj))
    throw new MachineSpecError('Machine document must be a mapping', { problemValue: obj });

  return _.mapKeys(obj, (value, key) => _.get(synonyms, key, key));
}

/**
 * Read a machine document (YAML) into a validated {@link MachineSpec}.
 * The table must be deterministic and total over the declared states
 * (the keys of `table`) and the alphabet; a Moore document also needs an
 * output for each declared state.
 */
export function parseSpec (str: string): MachineSpec {
  let obj = loadDocument(str);
  log.debug(obj);

  let header = validated(() =>
    headerSchema.validateSync(obj, { abortEarly: false, stripUnknown: true }));

  let spec: MachineSpec;
  if (header.type === AutomatonType.mealy) {
    let table = parseTable(obj.table, MealyTransitionParser);
    spec = { ...header, type: AutomatonType.mealy, states: _.keys(table), table: table };
  } else {
    let table = parseTable(obj.table, MooreTransitionParser);
    spec = {
      ...header,
      type: AutomatonType.moore,
      states: _.keys(table),
      table: table,
      outputs: parseOutputs(obj.outputs),
    };
  }
  log.debug(spec);

  assertValid(specErrors(spec));
  return spec;
}

export function specErrors (spec: MachineSpec): string[] {
  return spec.type === AutomatonType.moore
    ? _.concat(tableErrors(spec), outputErrors(spec))
    : tableErrors(spec);
}

export function parseMealySpec (str: string): MealySpec {
  let spec = parseSpec(str);
  if (spec.type !== AutomatonType.mealy)
    throw new MachineSpecError('Expected a mealy machine', { problemValue: spec.type });
  return spec;
}

export function parseMooreSpec (str: string): MooreSpec {
  let spec = parseSpec(str);
  if (spec.type !== AutomatonType.moore)
    throw new MachineSpecError('Expected a moore machine', { problemValue: spec.type });
  return spec;
}
