import { isDuplicateKeyError } from './mongo-error.util';

describe('isDuplicateKeyError', () => {
  it('recognises a unique index violation', () => {
    expect(isDuplicateKeyError(Object.assign(new Error('E11000'), { code: 11000 }))).toBe(true);
  });

  it.each([[new Error('boom')], [{ code: 121 }], [null], ['E11000']])('rejects %p', (error) => {
    expect(isDuplicateKeyError(error)).toBe(false);
  });
});
