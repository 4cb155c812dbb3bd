import { resolveRequestId } from '../requestLogger';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('resolveRequestId', () => {
  it('should reuse a short, safe inbound id', () => {
    expect(resolveRequestId('req-123_a.b')).toBe('req-123_a.b');
  });

  it('should generate a uuid when no id is supplied', () => {
    expect(resolveRequestId(undefined)).toMatch(UUID);
    expect(resolveRequestId('')).toMatch(UUID);
  });

  it('should generate a uuid for oversized or unsafe ids', () => {
    expect(resolveRequestId('x'.repeat(65))).toMatch(UUID);
    expect(resolveRequestId('id with spaces')).toMatch(UUID);
    expect(resolveRequestId('id\r\nforged: 1')).toMatch(UUID);
  });
});
