import {
  admissionError,
  apiError,
  attachmentError,
  categoryForCode,
  kindToCodeSegment,
  maskSecret,
  maskSecretsInMessage,
  provisionError,
} from '../../src/domain/errors';

describe('kindToCodeSegment', () => {
  it('converts PascalCase kinds', () => {
    expect(kindToCodeSegment('NameCollisionExhausted')).toBe('NAME_COLLISION_EXHAUSTED');
    expect(kindToCodeSegment('TooLarge')).toBe('TOO_LARGE');
    expect(kindToCodeSegment('NotFound')).toBe('NOT_FOUND');
  });
});

describe('error factories', () => {
  it('namespaces attachment errors under VALIDATION', () => {
    const error = attachmentError('TooLarge', 'too big');
    expect(error.code).toBe('VALIDATION.ATTACHMENT.TOO_LARGE');
    expect(error.retryable).toBe(false);
  });

  it('suggests a round one build when the repository is missing', () => {
    const error = provisionError('NotFound', 'No repository found for task "t1"');
    expect(error.code).toBe('PROVISION.NOT_FOUND');
    expect(error.suggestedFixes.map((f) => f.type)).toEqual(['SUBMIT_ROUND_ONE']);
  });

  it('marks admission errors retryable', () => {
    const error = admissionError('t1');
    expect(error).toMatchObject({
      code: 'ADMISSION.IN_FLIGHT',
      message: 'Task "t1" is already being processed',
      retryable: true,
    });
  });

  it('wraps errors for the API', () => {
    expect(apiError(admissionError('t1'))).toEqual({
      status: 'error',
      message: 'Task "t1" is already being processed',
      code: 'ADMISSION.IN_FLIGHT',
    });
  });
});

describe('categoryForCode', () => {
  it('maps code prefixes to taxonomy classes', () => {
    expect(categoryForCode('AUTH.UNAUTHENTICATED')).toBe('AuthenticationError');
    expect(categoryForCode('VALIDATION.ATTACHMENT.TOO_LARGE')).toBe('ValidationError');
    expect(categoryForCode('PROVISION.RATE_LIMITED')).toBe('ProvisionError');
    expect(categoryForCode('SYSTEM.INTERNAL')).toBe('InternalError');
  });
});

describe('secret masking', () => {
  it('keeps only the last four characters', () => {
    expect(maskSecret('test-secret-value')).toBe('*************alue');
  });

  it('fully masks short secrets', () => {
    expect(maskSecret('abc')).toBe('****');
    expect(maskSecret('')).toBe('****');
  });

  it('masks every occurrence of every secret in a message', () => {
    const message = 'token test-token-1234 rejected; retried with test-token-1234 and key sk-placeholder';
    expect(maskSecretsInMessage(message, ['test-token-1234', undefined, 'sk-placeholder'])).toBe(
      'token ***********1234 rejected; retried with ***********1234 and key **********lder',
    );
  });

  it('ignores empty secrets', () => {
    expect(maskSecretsInMessage('nothing here', ['', undefined])).toBe('nothing here');
  });
});
