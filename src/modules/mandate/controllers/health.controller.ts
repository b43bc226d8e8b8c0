import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { InboundWebhookProcessor, StorageAdapter, StorageStatistics } from '../../../core';
import { INBOUND_WEBHOOK_PROCESSOR, STORAGE_ADAPTER } from '../constants';
import {
  ApiHealthCheck,
  ApiReadinessCheck,
  ApiServiceStatistics,
} from '../../../_shared/swagger/decorators';

type PipelineStatistics = ReturnType<InboundWebhookProcessor['getStatistics']>;

@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    @Inject(INBOUND_WEBHOOK_PROCESSOR)
    private readonly processor: InboundWebhookProcessor,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<{
    status: string;
    timestamp: Date;
    uptime: number;
  }> {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: string;
    checks: {
      database: boolean;
      pipeline: boolean;
    };
    details: {
      pipeline: PipelineStatistics;
      database: string;
    };
  }> {
    const databaseHealthy = await this.storageAdapter.isHealthy();

    return {
      status: databaseHealthy ? 'ready' : 'not_ready',
      checks: {
        database: databaseHealthy,
        pipeline: true,
      },
      details: {
        pipeline: this.processor.getStatistics(),
        database: databaseHealthy ? 'connected' : 'disconnected',
      },
    };
  }

  @Get('stats')
  @ApiServiceStatistics()
  async statistics(): Promise<{
    storage: StorageStatistics;
    pipeline: PipelineStatistics;
    runtime: { uptime: number; memory: NodeJS.MemoryUsage; node: string };
  }> {
    return {
      storage: await this.storageAdapter.getStatistics(),
      pipeline: this.processor.getStatistics(),
      runtime: {
        uptime: process.uptime(),
        memory: process.memoryUsage(),
        node: process.version,
      },
    };
  }
}
