import {
  EnvelopeStatus,
  MalformedPayloadError,
  OUTCOME_HTTP_STATUS,
  OutcomeType,
  outcomeFromError,
  ResponseBuilder,
  SignatureVerificationError,
  UnknownProviderError,
  UnreadableBodyError,
} from '../../src';

describe('ResponseBuilder', () => {
  const now = new Date('2024-03-01T12:00:00.000Z');
  let builder: ResponseBuilder;

  beforeEach(() => {
    builder = new ResponseBuilder(() => now);
  });

  it('should build success envelopes with data', () => {
    const data = {
      received_at: now.toISOString(),
      payload_size: 2,
      payload_type: 'object' as const,
    };

    expect(
      builder.build({ type: OutcomeType.ACCEPTED, message: 'Webhook processed successfully', data }),
    ).toEqual({
      httpStatus: 200,
      envelope: {
        status: EnvelopeStatus.SUCCESS,
        message: 'Webhook processed successfully',
        timestamp: '2024-03-01T12:00:00.000Z',
        data,
      },
    });
  });

  it('should build error envelopes without data', () => {
    const { envelope, httpStatus } = builder.build({ type: OutcomeType.MALFORMED_PAYLOAD });

    expect(httpStatus).toBe(400);
    expect(envelope).toEqual({
      status: EnvelopeStatus.ERROR,
      message: 'Invalid JSON format',
      timestamp: '2024-03-01T12:00:00.000Z',
    });
    expect('data' in envelope).toBe(false);
  });

  it('should use fixed messages per outcome', () => {
    const message = (outcome: Parameters<ResponseBuilder['build']>[0]) =>
      builder.build(outcome).envelope.message;

    expect(message({ type: OutcomeType.SIGNATURE_REJECTED })).toBe('Invalid webhook signature');
    expect(message({ type: OutcomeType.UNKNOWN_PROVIDER, provider: 'gitlab' })).toBe(
      'Unknown webhook provider: gitlab',
    );
    expect(message({ type: OutcomeType.NOT_FOUND, method: 'GET', path: '/missing' })).toBe(
      'Route not found: GET /missing',
    );
    expect(message({ type: OutcomeType.PAYLOAD_TOO_LARGE })).toBe('Payload too large');
    expect(message({ type: OutcomeType.UNREADABLE_BODY })).toBe('Request body could not be read');
    expect(message({ type: OutcomeType.INTERNAL_FAILURE })).toBe('Internal server error');
    expect(
      message({ type: OutcomeType.INTERNAL_FAILURE, message: 'Failed to process GitHub webhook' }),
    ).toBe('Failed to process GitHub webhook');
  });

  it('should map every outcome to its HTTP status', () => {
    expect(OUTCOME_HTTP_STATUS).toEqual({
      [OutcomeType.ACCEPTED]: 200,
      [OutcomeType.MALFORMED_PAYLOAD]: 400,
      [OutcomeType.UNREADABLE_BODY]: 400,
      [OutcomeType.SIGNATURE_REJECTED]: 401,
      [OutcomeType.UNKNOWN_PROVIDER]: 404,
      [OutcomeType.NOT_FOUND]: 404,
      [OutcomeType.PAYLOAD_TOO_LARGE]: 413,
      [OutcomeType.INTERNAL_FAILURE]: 500,
    });
  });

  it('should build the health envelope', () => {
    expect(builder.health('Webhook gateway is running')).toEqual({
      httpStatus: 200,
      envelope: {
        status: EnvelopeStatus.HEALTHY,
        message: 'Webhook gateway is running',
        timestamp: '2024-03-01T12:00:00.000Z',
      },
    });
  });

  describe('outcomeFromError', () => {
    it('should classify gateway errors', () => {
      expect(outcomeFromError(new MalformedPayloadError('bad'))).toEqual({
        type: OutcomeType.MALFORMED_PAYLOAD,
      });
      expect(outcomeFromError(new UnreadableBodyError('bad'))).toEqual({
        type: OutcomeType.UNREADABLE_BODY,
      });
      expect(outcomeFromError(new SignatureVerificationError('bad', 'github'))).toEqual({
        type: OutcomeType.SIGNATURE_REJECTED,
      });
      expect(outcomeFromError(new UnknownProviderError('gitlab'))).toEqual({
        type: OutcomeType.UNKNOWN_PROVIDER,
        provider: 'gitlab',
      });
    });

    it('should treat anything else as an internal failure', () => {
      expect(outcomeFromError(new TypeError('boom'), 'Failed to process GitHub webhook')).toEqual({
        type: OutcomeType.INTERNAL_FAILURE,
        message: 'Failed to process GitHub webhook',
      });
      expect(outcomeFromError('not an error')).toEqual({
        type: OutcomeType.INTERNAL_FAILURE,
        message: 'Internal server error',
      });
    });
  });
});
