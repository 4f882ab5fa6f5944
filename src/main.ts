import * as _ from 'lodash';
import * as yup from 'yup';

import { createMealyMachine, createMooreMachine } from './machines';
import { validated } from './parser-utils';
import { formatTrace } from './report/trace-report';
import { renderDiagram } from './report/diagram';
import { simulate } from './Simulator';

export const DEFAULT_INPUTS = ['011001', '110011'];

let InputsSchema = yup
  .array(
    yup
      .string()
      .defined()
      .matches(/^[01]*$/, (params) => JSON.stringify(params.value) + ' is not a binary string')
  )
  .defined();

/**
 * @throws MachineSpecError listing every argument that is not a binary string.
 */
export function parseInputs (args: string[]): string[] {
  return validated(() => InputsSchema.validateSync(args, { abortEarly: false }));
}

/**
 * Print both diagrams, then the Mealy and Moore traces of every input.
 */
export function main (inputs: string[] = DEFAULT_INPUTS, print: (text: string) => void = console.log): void {
  let mealy = createMealyMachine();
  let moore = createMooreMachine();

  print(renderDiagram(mealy).join('\n'));
  print(renderDiagram(moore).join('\n'));

  _.forEach(inputs, (input) => {
    print(formatTrace(simulate(mealy, input)).join('\n'));
    print(formatTrace(simulate(moore, input)).join('\n'));
  });
}
