import { stripIndent } from 'common-tags';

import MealyMachine from './MealyMachine';
import MooreMachine from './MooreMachine';
import { parseMealySpec, parseMooreSpec } from './parser';

// Both machines emit 'a' once "01" has been read and 'b' otherwise.

export const MEALY_01 = stripIndent`
  type: mealy
  title: MEALY MACHINE
  description: "(Outputs 'a' when '01' occurs, else 'b')"
  start state: A
  table:
    A:
      0: {state: B, write: b}
      1: {state: A, write: b}
    B:
      0: {state: B, write: b}
      1: {state: C, write: a}
    C:
      0: {state: A, write: b}
      1: {state: C, write: b}
  `;

export const MOORE_01 = stripIndent`
  type: moore
  title: MOORE MACHINE
  description: "(Outputs 'a' in state C, which indicates '01' was seen)"
  start state: A
  outputs:
    A: b
    B: b
    C: a
  table:
    A:
      0: B
      1: A
    B:
      0: B
      1: C
    C:
      0: A
      1: C
  `;

export function createMealyMachine (): MealyMachine {
  return new MealyMachine(parseMealySpec(MEALY_01));
}

export function createMooreMachine (): MooreMachine {
  return new MooreMachine(parseMooreSpec(MOORE_01));
}
