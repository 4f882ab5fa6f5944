import * as _ from 'lodash';

import type { Trace } from '../Simulator';

const CELL_WIDTH = 3;

function row (header: string, values: ReadonlyArray<string | number>): string {
  return header + _.map(values, (value) => _.padEnd(String(value), CELL_WIDTH)).join('  ');
}

/** `1:b 2:a ...`; positions are 1-based. */
export function numberedOutput (output: string): string {
  return _.map(output.split(''), (ch, i) => (i + 1) + ':' + ch).join(' ');
}

/**
 * Console rendering of a trace: a header, the steps as a transposed table,
 * then the final and numbered output.
 */
export function formatTrace (trace: Trace): string[] {
  let entries = trace.entries;
  return [
    '',
    '--- ' + _.toUpper(trace.type) + ' SIMULATION for input: ' + trace.input + ' ---',
    row('Step:  ', _.map(entries, 'step')),
    row('State: ', _.map(entries, 'state')),
    row('Input: ', _.map(entries, 'input')),
    row('Next:  ', _.map(entries, 'next')),
    row('Output:', _.map(entries, 'output')),
    '',
    'Final Output: ' + trace.output,
    '',
    'Numbered Output: ' + numberedOutput(trace.output),
    '',
  ];
}
