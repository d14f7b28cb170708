import { describe, it, expect } from 'vitest';
import { FormatRegistry, createFormatRule } from '../../../src/domain/services/FormatRegistry.js';
import type { FormatRuleDefinition } from '../../../src/domain/services/FormatRegistry.js';
import { ConfigError } from '../../../src/domain/errors/CleaningErrors.js';

const yearFirst: FormatRuleDefinition = {
  name: 'year_first',
  templatePattern: '%Y%m%d',
  recognitionPattern: '\\d{8}',
  isSerialNumeric: false,
};

const dayFirst: FormatRuleDefinition = {
  name: 'day_first',
  templatePattern: '%d%m%Y',
  recognitionPattern: '\\d{8}',
  isSerialNumeric: false,
};

const serial: FormatRuleDefinition = {
  name: 'excel_serial',
  templatePattern: null,
  recognitionPattern: '\\d{1,5}(\\.0)?',
  isSerialNumeric: true,
  description: 'Spreadsheet serial day',
};

describe('FormatRegistry', () => {
  it('should decode with the first rule that matches and decodes', () => {
    const registry = FormatRegistry.fromConfig([yearFirst, dayFirst]);

    const match = registry.resolve('20240102');

    expect(match?.rule.name).toBe('year_first');
    expect(match?.value).toMatchObject({ year: 2024, month: 1, day: 2 });
  });

  it('should respect declared order between rules that both decode', () => {
    const registry = FormatRegistry.fromConfig([{ ...yearFirst, name: 'first' }, { ...yearFirst, name: 'second' }]);

    expect(registry.resolve('20240102')?.rule.name).toBe('first');
  });

  it('should fall through to the next rule when a matching rule cannot decode', () => {
    const registry = FormatRegistry.fromConfig([yearFirst, dayFirst]);

    const match = registry.resolve('01022024');

    expect(match?.rule.name).toBe('day_first');
    expect(match?.value).toMatchObject({ year: 2024, month: 2, day: 1 });
  });

  it('should stop at the first matching rule in fail mode', () => {
    const registry = FormatRegistry.fromConfig([yearFirst, dayFirst], { onDecodeFailure: 'fail' });

    expect(registry.resolve('01022024')).toBeNull();
    expect(registry.resolve('20240102')?.rule.name).toBe('year_first');
  });

  it('should require a full-string match', () => {
    const registry = FormatRegistry.fromConfig([yearFirst]);

    expect(registry.resolve('20240102x')).toBeNull();
    expect(registry.resolve('x20240102')).toBeNull();
  });

  it('should decode serial rules', () => {
    const registry = FormatRegistry.fromConfig([serial]);

    expect(registry.resolve('45118')?.value).toMatchObject({ year: 2023, month: 7, day: 11, hasTime: false });
  });

  it('should return null for values no rule recognises', () => {
    expect(FormatRegistry.fromConfig([yearFirst, serial]).resolve('N/A')).toBeNull();
  });

  describe('resolveMany', () => {
    it('should return one entry per distinct value', () => {
      const registry = FormatRegistry.fromConfig([yearFirst, serial]);

      const results = registry.resolveMany(['20240102', '45118', '20240102', 'bad']);

      expect([...results.keys()].sort()).toEqual(['20240102', '45118', 'bad']);
      expect(results.get('20240102')?.rule.name).toBe('year_first');
      expect(results.get('45118')?.rule.name).toBe('excel_serial');
      expect(results.get('bad')).toBeNull();
    });

    it('should agree with resolve', () => {
      const registry = FormatRegistry.fromConfig([yearFirst, dayFirst]);

      const results = registry.resolveMany(['01022024']);

      expect(results.get('01022024')?.rule.name).toBe(registry.resolve('01022024')?.rule.name);
    });
  });

  describe('extend', () => {
    it('should append rules without touching the original registry', () => {
      const base = FormatRegistry.fromConfig([yearFirst]);

      const extended = base.extend([serial]);

      expect(base.size).toBe(1);
      expect(extended.size).toBe(2);
      expect(base.resolve('45118')).toBeNull();
      expect(extended.resolve('45118')?.rule.name).toBe('excel_serial');
    });

    it('should keep the decode-failure mode', () => {
      const base = FormatRegistry.fromConfig([yearFirst], { onDecodeFailure: 'fail' });

      expect(base.extend([dayFirst]).resolve('01022024')).toBeNull();
    });

    it('should reject a rule name already in use', () => {
      const base = FormatRegistry.fromConfig([yearFirst]);

      expect(() => base.extend([yearFirst])).toThrow(ConfigError);
    });

    it('should report a definition with a bad template as a ConfigError at its index', () => {
      const base = FormatRegistry.fromConfig([yearFirst]);
      const badTemplate: FormatRuleDefinition = {
        name: 'bad_template',
        templatePattern: '%Y-%q',
        recognitionPattern: '\\d{4}-\\d',
        isSerialNumeric: false,
      };

      let caught: unknown;
      try {
        base.extend([serial, badTemplate]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigError);
      expect(caught).toMatchObject({
        path: 'rules[1]',
        message: "Invalid format rule 'bad_template': Unsupported directive '%q' in template '%Y-%q'",
      });
    });

    it('should report a definition with a bad recognition pattern as a ConfigError', () => {
      const base = FormatRegistry.fromConfig([yearFirst]);
      const badPattern: FormatRuleDefinition = {
        name: 'bad_pattern',
        templatePattern: '%d%m%Y',
        recognitionPattern: '(',
        isSerialNumeric: false,
      };

      expect(() => base.extend([badPattern])).toThrow(ConfigError);
      expect(() => base.extend([badPattern])).toThrow(/^Invalid format rule 'bad_pattern': /);
    });
  });

  it('should switch decode-failure mode with withDecodeFailure', () => {
    const registry = FormatRegistry.fromConfig([yearFirst, dayFirst]).withDecodeFailure('fail');

    expect(registry.onDecodeFailure).toBe('fail');
    expect(registry.resolve('01022024')).toBeNull();
  });

  it('should describe rules in priority order', () => {
    const registry = FormatRegistry.fromConfig([serial, yearFirst]);

    expect(registry.describe()).toEqual([
      { name: 'excel_serial', kind: 'serial', description: 'Spreadsheet serial day' },
      { name: 'year_first', kind: 'template', description: '' },
    ]);
  });

  it('should freeze its rule list', () => {
    expect(Object.isFrozen(FormatRegistry.fromConfig([yearFirst]).rules)).toBe(true);
  });
});

describe('createFormatRule', () => {
  it('should require a template for non-serial rules', () => {
    expect(() => createFormatRule({ ...yearFirst, templatePattern: null })).toThrow(ConfigError);
  });

  it('should build a serial rule without a template', () => {
    expect(createFormatRule(serial).kind).toBe('serial');
  });
});
