import { clientErrorStatus, describeError, isBodyParseError } from '../errors';

describe('describeError', () => {
  it('should use the error message', () => {
    expect(describeError(new Error('connection refused'))).toBe('connection refused');
  });

  it('should fall back to the error name for an empty message', () => {
    expect(describeError(new TypeError(''))).toBe('TypeError');
  });

  it('should stringify other thrown values', () => {
    expect(describeError('boom')).toBe('boom');
    expect(describeError(42)).toBe('42');
    expect(describeError(undefined)).toBe('undefined');
  });
});

describe('isBodyParseError', () => {
  it('should recognise body-parser syntax failures', () => {
    expect(isBodyParseError({ type: 'entity.parse.failed', status: 400 })).toBe(true);
  });

  it('should ignore other errors', () => {
    expect(isBodyParseError(new Error('x'))).toBe(false);
    expect(isBodyParseError({ type: 'entity.too.large' })).toBe(false);
    expect(isBodyParseError(null)).toBe(false);
  });
});

describe('clientErrorStatus', () => {
  it('should read a 4xx status', () => {
    expect(clientErrorStatus({ type: 'entity.too.large', status: 413, statusCode: 413 })).toBe(413);
  });

  it('should fall back to statusCode', () => {
    expect(clientErrorStatus({ statusCode: 415 })).toBe(415);
  });

  it('should ignore server errors and values without a status', () => {
    expect(clientErrorStatus({ status: 500 })).toBeUndefined();
    expect(clientErrorStatus({ status: '413' })).toBeUndefined();
    expect(clientErrorStatus(new Error('x'))).toBeUndefined();
    expect(clientErrorStatus(undefined)).toBeUndefined();
  });
});
