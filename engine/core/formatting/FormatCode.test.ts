/**
 * Format code parser tests: section splitting, bracket metadata,
 * classification and digit patterns.
 */

import { describe, it, expect } from 'vitest';
import {
  conditionAdmitsOnlyNegatives,
  evaluateCondition,
  parseFormatCode,
  parseNumberPattern,
  restoreLiterals,
  splitSections,
} from './FormatCode.js';

describe('FormatCode', () => {
  describe('splitSections', () => {
    it('should split on semicolons', () => {
      expect(splitSections('0;(0);"-"')).toEqual(['0', '(0)', '"-"']);
    });

    it('should ignore semicolons in quotes and after escapes', () => {
      expect(splitSections('"a;b"0;\\;0')).toEqual(['"a;b"0', '\\;0']);
    });

    it('should keep empty sections', () => {
      expect(splitSections('0;;')).toEqual(['0', '', '']);
    });
  });

  describe('parseFormatCode', () => {
    it('should read colors and conditions', () => {
      const parsed = parseFormatCode('[Green][>100]0;[Red]-0', 'number');
      expect(parsed.sections[0].color).toBe('#00FF00');
      expect(parsed.sections[0].condition).toEqual({ operator: '>', value: 100 });
      expect(parsed.sections[1].color).toBe('#FF0000');
    });

    it('should read currency brackets', () => {
      const [section] = parseFormatCode('[$€-407]0.00', 'currency').sections;
      expect(section.currency).toBe('€');
      expect(section.localeCode).toBe('407');
      expect(section.literals).toEqual(['€']);
    });

    it('should classify sections', () => {
      const kinds = (code: string) => parseFormatCode(code, 'custom').sections.map((s) => s.kind);
      expect(kinds('General')).toEqual(['general']);
      expect(kinds('yyyy-mm-dd')).toEqual(['datetime']);
      expect(kinds('[h]:mm')).toEqual(['datetime']);
      expect(kinds('#,##0;"none"')).toEqual(['number', 'literal']);
      expect(kinds('@')).toEqual(['text']);
    });

    it('should mark elapsed sections', () => {
      expect(parseFormatCode('[h]:mm:ss', 'duration').sections[0].elapsed).toBe(true);
      expect(parseFormatCode('h:mm:ss', 'duration').sections[0].elapsed).toBe(false);
    });

    it('should take the fourth section as text', () => {
      const parsed = parseFormatCode('0;-0;0;"x"@', 'number');
      expect(parsed.numericSections).toHaveLength(3);
      expect(parsed.textSection?.source).toBe('"x"@');
    });

    it('should take a trailing @ section as text', () => {
      const parsed = parseFormatCode('0.00;@', 'number');
      expect(parsed.numericSections).toHaveLength(1);
      expect(parsed.textSection?.source).toBe('@');
    });

    it('should keep unknown brackets as literals', () => {
      const [section] = parseFormatCode('[Purple]0', 'number').sections;
      expect(section.color).toBeUndefined();
      expect(restoreLiterals(section.body, section)).toBe('[Purple]0');
    });

    it('should record the first fill only', () => {
      const [section] = parseFormatCode('*-0*=', 'number').sections;
      expect(section.fillChar).toBe('-');
      expect(section.fillIndex).toBe(0);
      expect(section.literals).toEqual(['']);
    });
  });

  describe('parseNumberPattern', () => {
    it('should split prefix, integer, decimals and suffix', () => {
      const pattern = parseNumberPattern('$#,##0.00 x');
      expect(pattern.prefix).toBe('$');
      expect(pattern.integer).toBe('###0');
      expect(pattern.grouping).toBe(true);
      expect(pattern.decimals).toBe('00');
      expect(pattern.suffix).toBe(' x');
    });

    it('should count scale commas and percents', () => {
      expect(parseNumberPattern('0.0,,').scale).toBe(2);
      expect(parseNumberPattern('0%').percentCount).toBe(1);
    });

    it('should read exponents', () => {
      expect(parseNumberPattern('0.00E+00').exponent).toEqual({ upper: true, alwaysSign: true, digits: 2 });
    });

    it('should read fractions', () => {
      expect(parseNumberPattern('# ??/16').fraction).toEqual({
        integer: '#',
        separator: ' ',
        numerator: '??',
        denominator: { fixed: 16 },
      });
      expect(parseNumberPattern('?/?').fraction).toEqual({
        integer: '',
        separator: '',
        numerator: '?',
        denominator: { placeholders: '?' },
      });
    });
  });

  describe('conditions', () => {
    it('should evaluate every operator', () => {
      expect(evaluateCondition({ operator: '<', value: 0 }, -1)).toBe(true);
      expect(evaluateCondition({ operator: '<=', value: 0 }, 0)).toBe(true);
      expect(evaluateCondition({ operator: '>', value: 0 }, 0)).toBe(false);
      expect(evaluateCondition({ operator: '>=', value: 0 }, 0)).toBe(true);
      expect(evaluateCondition({ operator: '=', value: 5 }, 5)).toBe(true);
      expect(evaluateCondition({ operator: '<>', value: 5 }, 5)).toBe(false);
    });

    it('should detect negative-only conditions', () => {
      expect(conditionAdmitsOnlyNegatives({ operator: '<', value: 0 })).toBe(true);
      expect(conditionAdmitsOnlyNegatives({ operator: '<', value: 10 })).toBe(false);
      expect(conditionAdmitsOnlyNegatives({ operator: '=', value: -1 })).toBe(true);
    });
  });
});
