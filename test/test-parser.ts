import * as assert from 'assert';
import { stripIndent } from 'common-tags';
import * as _ from "lodash";

import { parseSpec, parseMealySpec, parseMooreSpec } from '../src/parser';
import MachineSpecError from '../src/MachineSpecError';
import { AutomatonType } from '../src/TransitionSpec';

describe('Parser', function() {
  describe('parse', function() {
    describe('type', function() {
      it('legal', function () {
        let str = stripIndent`
          type: mealy
          start state: A
          table:
            A:
              0,1: {state: A, write: b}
          `;
        let spec = parseSpec(str);
        assert.strictEqual(spec.type, AutomatonType.mealy);
      });

      it('illegal', function () {
        let str = stripIndent`
          type: foo
          start state: A
          `;

        assert.throws(() => parseSpec(str), {
          name: 'MachineSpecError',
          reason: 'Validation Error',
          details: {
            validationErrors: ['Automaton must be of type ["mealy","moore"]']
          }
        });
      });

      it('undefined', function () {
        let str = stripIndent`
          start state: A
          `;

        assert.throws(() => parseSpec(str), {
          name: 'MachineSpecError',
          details: {
            validationErrors: ['type is required']
          }
        });
      });

      it('empty document', function () {
        assert.throws(() => parseSpec(''), (e: unknown) =>
          e instanceof MachineSpecError
            && e.reason === 'Validation Error'
            && _.isEqual(_.sortBy(e.details.validationErrors), ['start state is required', 'type is required'])
        );
      });

      it('wrong machine kind', function () {
        let str = stripIndent`
          type: mealy
          start state: A
          table:
            A:
              0,1: {state: A, write: b}
          `;

        assert.throws(() => parseMooreSpec(str), {
          name: 'MachineSpecError',
          reason: 'Expected a moore machine',
          details: { problemValue: 'mealy' }
        });
      });
    });

    describe('document', function() {
      it('YAML syntax error', function () {
        assert.throws(() => parseSpec('table: ['), {
          name: 'MachineSpecError',
          reason: 'YAML Error'
        });
      });

      it('not a mapping', function () {
        assert.throws(() => parseSpec('- mealy'), {
          name: 'MachineSpecError',
          reason: 'Machine document must be a mapping',
          details: { problemValue: ['mealy'] }
        });
      });

      it('title and description', function () {
        let str = stripIndent`
          type: mealy
          title: DETECTOR
          description: "(ones and zeros)"
          start state: A
          table:
            A:
              0,1: {state: A, write: b}
          `;
        let spec = parseSpec(str);
        assert.strictEqual(spec.title, 'DETECTOR');
        assert.strictEqual(spec.description, '(ones and zeros)');
      });

      it('title and description default to empty', function () {
        let str = stripIndent`
          type: mealy
          start state: A
          table:
            A:
              0,1: {state: A, write: b}
          `;
        let spec = parseSpec(str);
        assert.strictEqual(spec.title, '');
        assert.strictEqual(spec.description, '');
      });

      it('"start" is a synonym of "start state"', function () {
        let str = stripIndent`
          type: mealy
          start: A
          table:
            A:
              0,1: {state: A, write: b}
          `;
        assert.strictEqual(parseSpec(str).startState, 'A');
      });

      it('declared states follow the table', function () {
        let str = stripIndent`
          type: moore
          start state: X
          outputs: {X: a, Y: b}
          table:
            X: {0: Y, 1: X}
            Y: {0: Y, 1: X}
          `;
        assert.deepStrictEqual(parseSpec(str).states, ['X', 'Y']);
      });
    });

    describe('Mealy', function() {
      describe('transition table', function() {
        it('regular', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0: {state: B, write: b}
                1: {state: A, write: b}
              B:
                0: {state: B, write: b}
                1: {state: A, write: a}
            `;

          let spec = parseMealySpec(str);
          assert.deepStrictEqual(spec.table, {
            A: {
              '0': [{from: 'A', read: '0', to: 'B', write: 'b'}],
              '1': [{from: 'A', read: '1', to: 'A', write: 'b'}]
            },
            B: {
              '0': [{from: 'B', read: '0', to: 'B', write: 'b'}],
              '1': [{from: 'B', read: '1', to: 'A', write: 'a'}]
            }
          });
        });

        it('multiple symbols', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0, 1: {state: A, write: b}
            `;

          let spec = parseMealySpec(str);
          assert.deepStrictEqual(spec.table, {
            A: {
              '0': [{from: 'A', read: '0', to: 'A', write: 'b'}],
              '1': [{from: 'A', read: '1', to: 'A', write: 'b'}]
            }
          });
        });

        it('state undefined', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0,1: {write: a}
            `;

          let spec = parseMealySpec(str);
          assert.deepStrictEqual(spec.table.A['1'], [{from: 'A', read: '1', to: 'A', write: 'a'}]);
        });

        it('non string state', function () {
          let str = stripIndent`
            type: mealy
            start state: 1
            table:
              1:
                0,1: {state: 1, write: b}
            `;

          let spec = parseMealySpec(str);
          assert.strictEqual(spec.startState, '1');
          assert.deepStrictEqual(spec.table['1']['0'], [{from: '1', read: '0', to: '1', write: 'b'}]);
        });

        it('output missing', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0,1: {state: A}
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            reason: 'Invalid transition from state A on 0',
            details: {
              validationErrors: ['output symbol is required']
            }
          });
        });

        it('illegal output', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0: {state: A, write: c}
                1: {state: A, write: b}
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            reason: 'Invalid transition from state A on 0',
            details: {
              validationErrors: ['output symbol must be one of ["a","b"]']
            }
          });
        });

        it('symbol outside the alphabet', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                2: {state: A, write: b}
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            reason: 'Invalid transition from state A on 2',
            details: {
              validationErrors: ['input symbol must be one of ["0","1"]']
            }
          });
        });

        it('destination without output', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0: B
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            reason: 'Mealy transition A on 0 needs a state and an output',
            details: { problemValue: 'B' }
          });
        });

        it('row is not a mapping', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A: B
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            reason: 'Transitions of state A must map symbols to transitions',
            details: { problemValue: 'B' }
          });
        });
      });

      describe('validation', function() {
        it('undeclared start state', function () {
          let str = stripIndent`
            type: mealy
            start state: Z
            table:
              A:
                0,1: {state: A, write: b}
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            reason: 'Validation Error',
            details: {
              validationErrors: ['start state Z must be declared']
            }
          });
        });

        it('undeclared state', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0: {state: B, write: b}
                1: {state: A, write: b}
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            details: {
              validationErrors: ['state B must be declared']
            }
          });
        });

        it('missing transition', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0: {state: A, write: b}
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            details: {
              validationErrors: ['no transition from state A on 1']
            }
          });
        });

        it('state without transitions', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0,1: {state: B, write: b}
              B:
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            details: {
              validationErrors: [
                'no transition from state B on 0',
                'no transition from state B on 1'
              ]
            }
          });
        });

        it('nondeterministic', function () {
          let str = stripIndent`
            type: mealy
            start state: A
            table:
              A:
                0: {state: A, write: b}
                0,1: {state: A, write: a}
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            details: {
              validationErrors: ['nondeterministic transitions: A->A on 0 ; A->A on 0']
            }
          });
        });
      });
    });

    describe('Moore', function() {
      describe('transition table', function() {
        it('regular', function () {
          let str = stripIndent`
            type: moore
            start state: A
            outputs:
              A: b
              B: a
            table:
              A:
                0: B
                1: A
              B:
                0,1: {state: A}
            `;

          let spec = parseMooreSpec(str);
          assert.deepStrictEqual(spec.table, {
            A: {
              '0': [{from: 'A', read: '0', to: 'B'}],
              '1': [{from: 'A', read: '1', to: 'A'}]
            },
            B: {
              '0': [{from: 'B', read: '0', to: 'A'}],
              '1': [{from: 'B', read: '1', to: 'A'}]
            }
          });
          assert.deepStrictEqual(spec.outputs, {A: 'b', B: 'a'});
        });

        it('null transition', function () {
          let str = stripIndent`
            type: moore
            start state: A
            outputs:
              A: b
            table:
              A:
                0:
                1:
            `;

          let spec = parseMooreSpec(str);
          assert.deepStrictEqual(spec.table, {
            A: {
              '0': [{from: 'A', read: '0', to: 'A'}],
              '1': [{from: 'A', read: '1', to: 'A'}]
            }
          });
        });
      });

      describe('outputs', function() {
        it('missing output', function () {
          let str = stripIndent`
            type: moore
            start state: A
            outputs:
              A: b
            table:
              A:
                0,1: B
              B:
                0,1: A
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            details: {
              validationErrors: ['no output for state B']
            }
          });
        });

        it('output of an undeclared state', function () {
          let str = stripIndent`
            type: moore
            start state: A
            outputs:
              A: b
              D: a
            table:
              A:
                0,1: A
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            details: {
              validationErrors: ['output given for undeclared state D']
            }
          });
        });

        it('illegal output', function () {
          let str = stripIndent`
            type: moore
            start state: A
            outputs:
              A: z
            table:
              A:
                0,1: A
            `;

          assert.throws(() => parseSpec(str), {
            name: 'MachineSpecError',
            reason: 'Validation Error',
            details: {
              validationErrors: ['output symbol must be one of ["a","b"]']
            }
          });
        });
      });
    });
  });

  describe('MachineSpecError', function() {
    it('lists validation errors in its message', function () {
      let error = new MachineSpecError('Validation Error', {
        validationErrors: ['first', 'second']
      });
      assert.strictEqual(error.message, 'Validation Error\n  - first\n  - second');
      assert.ok(error instanceof MachineSpecError);
      assert.ok(error instanceof Error);
    });

    it('shows the problem value', function () {
      let error = new MachineSpecError('Bad row', { problemValue: 'B' });
      assert.strictEqual(error.message, "Bad row: 'B'");
      assert.deepStrictEqual(error.details, { problemValue: 'B' });
    });
  });
});
