import { Controller, Get, Inject, Res } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { Response } from 'express';
import type { IngestionGateway } from '../../../core';
import { ApiHealthCheck } from '../../../_shared/swagger/decorators';
import { INGESTION_GATEWAY } from '../constants';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller()
export class HealthController {
  constructor(
    @Inject(INGESTION_GATEWAY)
    private readonly gateway: IngestionGateway,
  ) {}

  @Get()
  @ApiHealthCheck()
  health(@Res() res: Response): void {
    const { envelope, httpStatus } = this.gateway.health();
    res.status(httpStatus).json(envelope);
  }
}
