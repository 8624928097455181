import { Module } from '@nestjs/common';
import { SalesVelocityController } from './sales-velocity.controller';
import {
  DrizzleSalesVelocityRepository,
  SALES_VELOCITY_REPOSITORY,
} from './sales-velocity.repository';
import { SalesVelocityService } from './sales-velocity.service';
import { SalesVelocityWorker } from './sales-velocity.worker';

@Module({
  controllers: [SalesVelocityController],
  providers: [
    SalesVelocityService,
    SalesVelocityWorker,
    {
      provide: SALES_VELOCITY_REPOSITORY,
      useClass: DrizzleSalesVelocityRepository,
    },
  ],
  exports: [SalesVelocityService],
})
export class SalesVelocityModule {}
