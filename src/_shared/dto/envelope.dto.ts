import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { EnvelopeStatus, EventHandlerTag } from '../../core';

const PAYLOAD_TYPES = ['object', 'array', 'string', 'number', 'boolean', 'null', 'raw', 'form'];

/**
 * Data returned by POST /webhook
 */
export class PayloadSummaryDto {
  @ApiProperty({
    description: 'When the payload was received (ISO-8601, UTC)',
    example: '2024-02-14T10:15:30.000Z',
  })
  received_at!: string;

  @ApiProperty({
    description: 'Length of the serialized payload',
    example: 63,
  })
  payload_size!: number;

  @ApiProperty({
    description: 'Coarse payload type: the JSON kind, or raw/form for non-JSON bodies',
    enum: PAYLOAD_TYPES,
    example: 'object',
  })
  payload_type!: string;
}

/**
 * Data returned by POST /webhook/:provider
 */
export class ProviderEventSummaryDto {
  @ApiProperty({ description: 'Provider the webhook was routed to', example: 'github' })
  provider!: string;

  @ApiProperty({
    description: 'Value of the provider event header, null when absent',
    example: 'push',
    nullable: true,
    type: String,
  })
  event_type!: string | null;

  @ApiProperty({
    description: 'Handler branch the event was dispatched to',
    enum: EventHandlerTag,
    example: EventHandlerTag.PUSH,
  })
  handler!: EventHandlerTag;

  @ApiProperty({ description: 'Whether a specific handler processed the event', example: true })
  handled!: boolean;

  @ApiProperty({
    description: 'Provider delivery id, null when absent',
    example: '72d3162e-cc78-11e3-81ab-4c9367dc0958',
    nullable: true,
    type: String,
  })
  delivery_id!: string | null;

  @ApiProperty({
    description: 'Whether the signature was checked and matched',
    example: false,
  })
  signature_verified!: boolean;

  @ApiProperty({ enum: PAYLOAD_TYPES, example: 'object' })
  payload_type!: string;
}

/**
 * Response envelope returned by every endpoint
 */
export class ResponseEnvelopeDto {
  @ApiProperty({
    description: 'success or error; healthy on the health endpoint',
    enum: EnvelopeStatus,
    example: EnvelopeStatus.SUCCESS,
  })
  status!: EnvelopeStatus;

  @ApiProperty({
    description: 'Human-readable outcome',
    example: 'Webhook processed successfully',
  })
  message!: string;

  @ApiProperty({
    description: 'Response time (ISO-8601, UTC)',
    example: '2024-02-14T10:15:30.000Z',
  })
  timestamp!: string;

  @ApiPropertyOptional({
    description: 'Processing summary, present on success only',
  })
  data?: PayloadSummaryDto | ProviderEventSummaryDto;
}
