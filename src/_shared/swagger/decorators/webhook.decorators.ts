import { applyDecorators } from '@nestjs/common';
import {
  ApiBody,
  ApiExtraModels,
  ApiHeader,
  ApiOperation,
  ApiParam,
  ApiResponse,
  getSchemaPath,
} from '@nestjs/swagger';
import {
  PayloadSummaryDto,
  ProviderEventSummaryDto,
  ResponseEnvelopeDto,
} from '../../dto';

const envelopeWithData = (dataModel: typeof PayloadSummaryDto | typeof ProviderEventSummaryDto) => ({
  allOf: [
    { $ref: getSchemaPath(ResponseEnvelopeDto) },
    {
      properties: {
        data: { $ref: getSchemaPath(dataModel) },
      },
    },
  ],
});

const errorResponses = () => [
  ApiResponse({
    status: 400,
    description: 'Body declared as JSON but not valid JSON',
    type: ResponseEnvelopeDto,
  }),
  ApiResponse({
    status: 413,
    description: 'Body larger than the configured limit',
    type: ResponseEnvelopeDto,
  }),
  ApiResponse({
    status: 500,
    description: 'Unexpected internal failure; details are logged, not returned',
    type: ResponseEnvelopeDto,
  }),
];

/**
 * Swagger decorator for the generic webhook endpoint
 */
export const ApiGenericWebhookEndpoint = () => {
  return applyDecorators(
    ApiExtraModels(ResponseEnvelopeDto, PayloadSummaryDto),
    ApiOperation({
      summary: 'Receive a generic webhook',
      description:
        'Accepts any body. JSON bodies (Content-Type application/json) are parsed; everything else is kept as raw text plus url-encoded form fields. Returns a payload summary.',
    }),
    ApiBody({
      description: 'Arbitrary webhook payload',
      required: false,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: {
          event: 'test_event',
          timestamp: 1234,
          data: { message: 'hi' },
        },
      },
    }),
    ApiResponse({
      status: 200,
      description: 'Webhook processed',
      schema: envelopeWithData(PayloadSummaryDto),
    }),
    ...errorResponses(),
  );
};

/**
 * Swagger decorator for named-provider webhook endpoints
 */
export const ApiProviderWebhookEndpoint = () => {
  return applyDecorators(
    ApiExtraModels(ResponseEnvelopeDto, ProviderEventSummaryDto),
    ApiOperation({
      summary: 'Receive a provider webhook',
      description:
        'Dispatches on the provider event header. Unknown or missing event types are accepted and reported as unhandled.',
    }),
    ApiParam({
      name: 'provider',
      description: 'Webhook provider name',
      example: 'github',
      required: true,
      schema: {
        type: 'string',
        enum: ['github'],
      },
    }),
    ApiHeader({
      name: 'x-github-event',
      description: 'GitHub event type (push, pull_request, ...)',
      required: false,
      example: 'push',
    }),
    ApiHeader({
      name: 'x-hub-signature-256',
      description: 'sha256= HMAC-SHA256 of the raw body; checked only when verification is enabled',
      required: false,
    }),
    ApiHeader({
      name: 'x-github-delivery',
      description: 'GitHub delivery id',
      required: false,
    }),
    ApiResponse({
      status: 200,
      description: 'Event dispatched (handled or unhandled)',
      schema: envelopeWithData(ProviderEventSummaryDto),
    }),
    ApiResponse({
      status: 401,
      description: 'Signature verification enabled and the signature did not match',
      type: ResponseEnvelopeDto,
    }),
    ApiResponse({
      status: 404,
      description: 'No adapter registered for the provider',
      type: ResponseEnvelopeDto,
    }),
    ...errorResponses(),
  );
};
