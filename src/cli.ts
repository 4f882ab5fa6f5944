#!/usr/bin/env node
import * as _ from 'lodash';

import log from './log';
import { DEFAULT_INPUTS, main, parseInputs } from './main';

let args = process.argv.slice(2);
log.verbose = _.includes(args, '--verbose');

try {
  let inputs = parseInputs(_.without(args, '--verbose'));
  main(inputs.length ? inputs : DEFAULT_INPUTS);
} catch (e) {
  console.error(e instanceof Error ? e.message : String(e));
  process.exitCode = 1;
}
