import { describe, it, expect } from 'vitest';
import { resolveOptions, config } from '../src/memory/config.js';
import { ContentMemoryError, ErrorCode, isContentMemoryError } from '../src/errors.js';

describe('resolveOptions', () => {
  it('fills in defaults', () => {
    const resolved = resolveOptions();
    expect(resolved.idAttribute).toBe(config.idAttribute);
    expect(resolved.containerSelector).toBe('body');
    expect(resolved.elementSelector).toBeUndefined();
    expect(resolved.now).toBe(Date.now);
    expect(resolved.mergePolicy).toBe('latest');
    expect(resolved.accumulate).toBe(true);
  });

  it.each([
    { containerSelector: '[[[' },
    { elementSelector: '[[[' },
  ])('rejects an unparseable selector %o', (options) => {
    let caught: unknown;
    try {
      resolveOptions(options);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ContentMemoryError);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
  });

  it('keeps explicit values', () => {
    const now = () => 42;
    const resolved = resolveOptions({ idAttribute: 'data-node', elementSelector: 'li', maxElements: 50, now });
    expect(resolved).toMatchObject({ idAttribute: 'data-node', elementSelector: 'li', maxElements: 50 });
    expect(resolved.now()).toBe(42);
  });

  it('reports every invalid field', () => {
    let caught: unknown;
    try {
      resolveOptions({ idAttribute: '', maxElements: 1.5 });
    } catch (err) {
      caught = err;
    }
    expect(isContentMemoryError(caught)).toBe(true);
    expect(caught).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
    expect(caught).toHaveProperty('details.issues');
    if (isContentMemoryError(caught)) {
      expect(caught.details?.issues).toHaveLength(2);
    }
  });
});

describe('ContentMemoryError', () => {
  it('serializes code, message and details', () => {
    const err = new ContentMemoryError(ErrorCode.INVALID_ARGUMENT, 'bad input', { field: 'x' });
    expect(err.name).toBe('ContentMemoryError');
    expect(err).toBeInstanceOf(Error);
    expect(JSON.parse(JSON.stringify(err))).toEqual({
      code: 'INVALID_ARGUMENT',
      message: 'bad input',
      details: { field: 'x' },
    });
  });
});
