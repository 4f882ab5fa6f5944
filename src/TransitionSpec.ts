import * as yup from "yup";

export const ALPHABET = ['0', '1'] as const;
export type InputSymbol = typeof ALPHABET[number];

export const OUTPUT_SYMBOLS = ['a', 'b'] as const;
export type OutputSymbol = typeof OUTPUT_SYMBOLS[number];

export enum AutomatonType {
  mealy = 'mealy',
  moore = 'moore',
}

export let StateSchema = yup
  .string()
  .required('state label is required');

export let SymbolSchema = yup
  .string()
  .required('input symbol is required')
  .oneOf(ALPHABET, 'input symbol must be one of ' + JSON.stringify(ALPHABET));

export let OutputSchema = yup
  .string()
  .required('output symbol is required')
  .oneOf(OUTPUT_SYMBOLS, 'output symbol must be one of ' + JSON.stringify(OUTPUT_SYMBOLS));

export let MealyTransitionSchema = yup.object({
  from: StateSchema,
  read: SymbolSchema,
  to: StateSchema,
  write: OutputSchema,
});

export type MealyTransition = yup.InferType<typeof MealyTransitionSchema>

export let MooreTransitionSchema = yup.object({
  from: StateSchema,
  read: SymbolSchema,
  to: StateSchema,
});

export type MooreTransition = yup.InferType<typeof MooreTransitionSchema>
export type Transition = MealyTransition | MooreTransition;

// several entries under one symbol make the machine nondeterministic, which is rejected
export type TransitionTable<T extends Transition> = {[state: string] : {[symbol: string]: T[]}};

export type MealyTransitionTable = TransitionTable<MealyTransition>;
export type MooreTransitionTable = TransitionTable<MooreTransition>;

export interface MachineSpecBase<T extends Transition> {
  type: AutomatonType;
  title: string;
  description: string;
  startState: string;
  /** Declared states, in document order. */
  states: string[];
  table: TransitionTable<T>;
}

export interface MealySpec extends MachineSpecBase<MealyTransition> {
  type: AutomatonType.mealy;
}

export interface MooreSpec extends MachineSpecBase<MooreTransition> {
  type: AutomatonType.moore;
  outputs: {[state: string]: OutputSymbol};
}

export type MachineSpec = MealySpec | MooreSpec;
