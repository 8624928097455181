import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SalesVelocityService } from './sales-velocity.service';

@Injectable()
export class SalesVelocityWorker implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SalesVelocityWorker.name);
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly salesVelocityService: SalesVelocityService,
    private readonly configService: ConfigService,
  ) {}

  onModuleInit() {
    const enabled = this.configService.get<boolean>(
      'salesVelocity.workerEnabled',
    );
    if (!enabled) {
      return;
    }
    const intervalMs = Number(
      this.configService.get('salesVelocity.workerIntervalMs') ?? 60000,
    );
    this.timer = setInterval(() => {
      void this.tick();
    }, intervalMs);
  }

  onModuleDestroy() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  async tick() {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      await this.salesVelocityService.aggregatePendingSales();
    } catch (error) {
      this.logger.error(
        `Sales aggregation run failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    } finally {
      this.running = false;
    }
  }
}
