'use strict';

/**
 * A state, or a (state, symbol) pair, that the machine's tables do not define.
 */
class MachineLookupError extends Error {
  public readonly state: string;
  public readonly symbol?: string;

  constructor (state: string, symbol?: string) {
    super(symbol === undefined
      ? 'no output defined for state ' + JSON.stringify(state)
      : 'no transition defined for (' + JSON.stringify(state) + ', ' + JSON.stringify(symbol) + ')');

    this.name = 'MachineLookupError';

    this.state = state;
    this.symbol = symbol;

    Object.setPrototypeOf(this, MachineLookupError.prototype);
  }
}

export default MachineLookupError;
