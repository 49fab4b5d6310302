// Tests for event map validation

import { describe, it, expect } from 'vitest';
import { validateEventMap } from './events.js';
import { boundHandler, callableHandler, methodHandler } from '../types/handlers.js';

describe('validateEventMap', () => {
  it('should accept an empty map', () => {
    expect(validateEventMap({})).toEqual({ valid: true, errors: [] });
  });

  it('should accept every declaration form', () => {
    const target = { audit() {} };
    const result = validateEventMap({
      beforeSave: 'onBeforeSave',
      afterSave: () => {},
      afterDelete: boundHandler(target, 'audit'),
      afterFind: callableHandler(() => {}),
    });

    expect(result.valid).toBe(true);
  });

  it('should accept a Map', () => {
    const result = validateEventMap(new Map([['beforeSave', 'onBeforeSave']]));
    expect(result.valid).toBe(true);
  });

  it('should fail for non-object input', () => {
    for (const value of [null, 'events', 42, ['beforeSave']]) {
      const result = validateEventMap(value);
      expect(result.valid).toBe(false);
      expect(result.errors[0].code).toBe('INVALID_TYPE');
    }
  });

  it('should flag blank event names', () => {
    const result = validateEventMap({ '  ': 'onBlank' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: 'events.  ',
        message: 'Event name must be a non-empty string',
        code: 'INVALID_EVENT_NAME',
      },
    ]);
  });

  it('should flag unrecognized declarations', () => {
    const result = validateEventMap({
      beforeSave: 42,
      afterSave: '',
      afterDelete: { kind: 'method' },
    });

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => [e.path, e.code])).toEqual([
      ['events.beforeSave', 'INVALID_DESCRIPTOR'],
      ['events.afterSave', 'INVALID_DESCRIPTOR'],
      ['events.afterDelete', 'INVALID_DESCRIPTOR'],
    ]);
    expect(result.errors[0].message).toBe('Unrecognized handler declaration (number)');
  });

  it('should flag blank method names in descriptors', () => {
    const result = validateEventMap({
      beforeSave: methodHandler(''),
      afterSave: boundHandler({ '  ': () => {} }, '  '),
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: 'events.beforeSave',
        message: 'Method name must be a non-empty string',
        code: 'INVALID_DESCRIPTOR',
      },
      {
        path: 'events.afterSave',
        message: 'Method name must be a non-empty string',
        code: 'INVALID_DESCRIPTOR',
      },
    ]);
  });
});
