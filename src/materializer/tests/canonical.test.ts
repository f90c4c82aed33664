import { describe, expect, it, test } from 'vitest';
import type { TestScenario } from '../../tests/types';
import type { SourceScalar } from '../../source/types';
import { NodeFlag } from '../../tree/types';
import {
  canonicalFloat,
  canonicalInteger,
  canonicalizeScalar
} from '../canonical';

/**
 * Test suite: scalar canonicalization.
 *
 * Coverage:
 * - Float overrides for non-finite values and negative zero.
 * - Host formatting of finite floats.
 * - Integer and boolean spellings.
 * - Quoting flag and temporal passthrough.
 */
describe('Scalar Canonicalizer', () => {
  describe('Floats', () => {
    const scenarios: TestScenario<number, string>[] = [
      {
        id: 'Positive Infinity',
        description: 'Infinity uses the .inf spelling',
        input: Infinity,
        expected: '.inf'
      },
      {
        id: 'Negative Infinity',
        description: '-Infinity uses the -.inf spelling',
        input: -Infinity,
        expected: '-.inf'
      },
      {
        id: 'NaN',
        description: 'NaN uses the .nan spelling',
        input: NaN,
        expected: '.nan'
      },
      {
        id: 'Negated NaN',
        description: 'The sign of NaN is ignored',
        input: -NaN,
        expected: '.nan'
      },
      {
        id: 'Negative Zero',
        description: 'Negative zero keeps its sign',
        input: -0,
        expected: '-0'
      },
      {
        id: 'Finite',
        description: 'Finite floats use the shortest round-trip text',
        input: 3.14,
        expected: '3.14'
      },
      {
        id: 'Fraction',
        description: 'Binary fractions are not padded',
        input: 0.1,
        expected: '0.1'
      },
      {
        id: 'Large',
        description: 'Large magnitudes switch to exponent notation',
        input: 1e21,
        expected: '1e+21'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(canonicalFloat(input)).toBe(expected);
    });
  });

  describe('Integers', () => {
    const scenarios: TestScenario<bigint, string>[] = [
      { id: 'Zero', description: 'Zero', input: 0n, expected: '0' },
      {
        id: 'Negative',
        description: 'Negative integers carry a minus sign',
        input: -42n,
        expected: '-42'
      },
      {
        id: 'Int64 Max',
        description: 'The full 64-bit range is preserved',
        input: 9223372036854775807n,
        expected: '9223372036854775807'
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(canonicalInteger(input)).toBe(expected);
    });
  });

  describe('Dispatch', () => {
    const scenarios: TestScenario<SourceScalar, { text: string; flags: number }>[] =
      [
        {
          id: 'String',
          description: 'Strings are verbatim and flagged as quoted',
          input: { kind: 'string', value: 'line 1\n"two"' },
          expected: { text: 'line 1\n"two"', flags: NodeFlag.ValueQuoted }
        },
        {
          id: 'Empty String',
          description: 'Empty strings are still quoted',
          input: { kind: 'string', value: '' },
          expected: { text: '', flags: NodeFlag.ValueQuoted }
        },
        {
          id: 'Integer',
          description: 'Integers carry no flag',
          input: { kind: 'integer', value: 8080n },
          expected: { text: '8080', flags: NodeFlag.None }
        },
        {
          id: 'Float',
          description: 'Floats carry no flag',
          input: { kind: 'float', value: -Infinity },
          expected: { text: '-.inf', flags: NodeFlag.None }
        },
        {
          id: 'True',
          description: 'Booleans are lowercase literals',
          input: { kind: 'boolean', value: true },
          expected: { text: 'true', flags: NodeFlag.None }
        },
        {
          id: 'False',
          description: 'Booleans are lowercase literals',
          input: { kind: 'boolean', value: false },
          expected: { text: 'false', flags: NodeFlag.None }
        },
        {
          id: 'Null',
          description: 'Null is the unquoted literal',
          input: { kind: 'null' },
          expected: { text: 'null', flags: NodeFlag.None }
        },
        {
          id: 'Date',
          description: 'Temporal text is forwarded unchanged',
          input: { kind: 'date', text: '1979-05-27' },
          expected: { text: '1979-05-27', flags: NodeFlag.None }
        },
        {
          id: 'Time',
          description: 'Temporal text is forwarded unchanged',
          input: { kind: 'time', text: '07:32:00' },
          expected: { text: '07:32:00', flags: NodeFlag.None }
        }
      ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(canonicalizeScalar(input)).toEqual(expected);
    });

    it('does not reformat temporal text', () => {
      // Offsets, fractions and separators are the front end's business.
      const text = '1979-05-27 07:32:00.999999-07:00';

      expect(
        canonicalizeScalar({ kind: 'datetime', text })
      ).toEqual({ text, flags: NodeFlag.None });
    });
  });
});
