import * as _ from 'lodash';
import * as util from 'util';

/**
 * Debug dumps of parsed documents. Silent unless `verbose` is switched on
 * (the CLI does so for `--verbose`).
 */
const log = {
  verbose: false,

  debug (...args: unknown[]): void {
    if (!log.verbose) return;
    console.log(...args.map((arg) =>
      _.isString(arg) ? arg : util.inspect(arg, false, null, true)));
  },
};

export default log;
