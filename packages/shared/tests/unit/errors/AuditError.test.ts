import {
  AuditError,
  ErrorCode,
  getUserFriendlyMessage,
  isAuditError,
} from '../../../src/errors/AuditError';

describe('AuditError', () => {
  it('carries code, message and context', () => {
    const error = new AuditError(ErrorCode.MALFORMED_INPUT, 'Row 3 is not a record', { index: 3 });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AuditError');
    expect(error.code).toBe(ErrorCode.MALFORMED_INPUT);
    expect(error.message).toBe('Row 3 is not a record');
    expect(error.context).toEqual({ index: 3 });
    expect(typeof error.timestamp).toBe('number');
  });

  it('builds a user message from the code and the error message', () => {
    const error = new AuditError(ErrorCode.UNKNOWN_DETECTOR, 'Unknown detector(s): volume');
    expect(error.getUserMessage()).toBe(
      'A configured detector does not exist. (Unknown detector(s): volume)',
    );
  });

  it('serialises for logging', () => {
    const error = new AuditError(ErrorCode.CONFIG_PARSE_ERROR, 'bad json');
    const json = error.toJSON();

    expect(json.name).toBe('AuditError');
    expect(json.code).toBe('CONFIG_PARSE_ERROR');
    expect(json.message).toBe('bad json');
    expect(json.timestamp).toBe(error.timestamp);
  });

  describe('getUserFriendlyMessage', () => {
    it('returns the base message without details', () => {
      expect(getUserFriendlyMessage(ErrorCode.CONFIG_VALIDATION_ERROR)).toBe(
        'Configuration values are not allowed.',
      );
    });

    it('appends details in parentheses', () => {
      expect(getUserFriendlyMessage(ErrorCode.UNKNOWN, 'boom')).toBe(
        'An unexpected error occurred. (boom)',
      );
    });
  });

  describe('isAuditError', () => {
    it('distinguishes audit errors from other values', () => {
      expect(isAuditError(new AuditError(ErrorCode.UNKNOWN, 'x'))).toBe(true);
      expect(isAuditError(new Error('x'))).toBe(false);
      expect(isAuditError('x')).toBe(false);
    });
  });
});
