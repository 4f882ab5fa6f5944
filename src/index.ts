export { default as MealyMachine } from './MealyMachine';
export { default as MooreMachine } from './MooreMachine';
export { default as MachineSpecError } from './MachineSpecError';
export { default as MachineLookupError } from './MachineLookupError';
export { StateAutomaton } from './StateAutomaton';
export type { Advance } from './StateAutomaton';
export { simulate } from './Simulator';
export type { Trace, TraceEntry } from './Simulator';
export { parseSpec, parseMealySpec, parseMooreSpec } from './parser';
export { createMealyMachine, createMooreMachine, MEALY_01, MOORE_01 } from './machines';
export { formatTrace, numberedOutput } from './report/trace-report';
export { renderDiagram } from './report/diagram';
export { default as StateGraph } from './state-diagram/StateGraph';
export { main, parseInputs, DEFAULT_INPUTS } from './main';
export * from './TransitionSpec';
