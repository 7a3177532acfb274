/**
 * Chainable stand-in for a mongoose Query: every builder call returns the
 * same object and `exec()` resolves to `result`.
 */
export function mockQuery<T>(result: T) {
  const query = {
    sort: jest.fn(),
    skip: jest.fn(),
    limit: jest.fn(),
    exec: jest.fn().mockResolvedValue(result),
  };
  query.sort.mockReturnValue(query);
  query.skip.mockReturnValue(query);
  query.limit.mockReturnValue(query);
  return query;
}
