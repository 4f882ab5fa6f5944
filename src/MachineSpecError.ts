'use strict';

import * as _ from 'lodash';
import * as util from 'util';

export interface MachineSpecErrorDetails {
  problemValue?: unknown;
  validationErrors?: string[];
}

/**
 * Raised when a machine document cannot be turned into a machine:
 * malformed YAML, unknown type, undeclared states, a partial table.
 */
class MachineSpecError extends Error {
  public readonly reason: string;
  public readonly details: MachineSpecErrorDetails;

  constructor (reason: string, details?: MachineSpecErrorDetails) {
    super(formatMessage(reason, details || {}));

    this.name = 'MachineSpecError';

    this.reason = reason;
    this.details = details || {};

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    // Set the prototype explicitly.
    Object.setPrototypeOf(this, MachineSpecError.prototype);
  }
}

// plain-text description for the console
function formatMessage (reason: string, details: MachineSpecErrorDetails): string {
  let problemValue = _.isUndefined(details.problemValue)
    ? ''
    : ': ' + util.inspect(details.problemValue, false, null, false);
  let validationErrors = _.map(details.validationErrors, (e) => '  - ' + e);

  return [reason + problemValue, ...validationErrors]
    .filter(_.identity)
    .join('\n');
}

export default MachineSpecError;
