import { describe, it, expect } from 'vitest';
import tryFn, { tryFnSync } from '../../src/concerns/try-fn.js';

describe('tryFn', () => {
  it('should return [true, null, data] for a resolved promise', async () => {
    const [ok, err, data] = await tryFn(Promise.resolve(42));
    expect(ok).toBe(true);
    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('should return [false, error, undefined] for a rejected promise', async () => {
    const [ok, err, data] = await tryFn(Promise.reject(new Error('nope')));
    expect(ok).toBe(false);
    expect(err?.message).toBe('nope');
    expect(data).toBeUndefined();
  });

  it('should call async functions', async () => {
    const [ok, , data] = await tryFn(async () => 'value');
    expect(ok).toBe(true);
    expect(data).toBe('value');
  });

  it('should catch a function that throws before returning a promise', async () => {
    const [ok, err] = await tryFn((): Promise<string> => {
      throw new Error('sync failure');
    });
    expect(ok).toBe(false);
    expect(err?.message).toBe('sync failure');
  });

  it('should wrap non-Error rejections', async () => {
    const [ok, err] = await tryFn(Promise.reject('plain string'));
    expect(ok).toBe(false);
    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('plain string');
  });
});

describe('tryFnSync', () => {
  it('should return the value of a synchronous function', () => {
    expect(tryFnSync(() => JSON.parse('{"a":1}'))).toEqual([true, null, { a: 1 }]);
  });

  it('should capture a synchronous throw', () => {
    const [ok, err, data] = tryFnSync(() => JSON.parse('{'));
    expect(ok).toBe(false);
    expect(err).toBeInstanceOf(SyntaxError);
    expect(data).toBeUndefined();
  });
});
