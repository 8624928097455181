import { Injectable, Logger } from '@nestjs/common';
import { AlertRun } from './alerts.types';

export const ALERT_PUBLISHER = 'ALERT_PUBLISHER';

export interface AlertPublisher {
  publish(run: AlertRun): Promise<void>;
}

@Injectable()
export class LoggingAlertPublisher implements AlertPublisher {
  private readonly logger = new Logger(LoggingAlertPublisher.name);

  async publish(run: AlertRun) {
    const critical = run.alerts.filter(
      (alert) => alert.severity === 'critical',
    ).length;
    this.logger.log(
      `Company ${run.companyId}: ${run.alerts.length} reorder alert(s) (${critical} critical) from ${run.evaluated} pair(s).`,
    );
    if (run.failures.length) {
      this.logger.warn(
        `Company ${run.companyId}: ${run.failures.length} pair(s) could not be evaluated.`,
      );
    }
  }
}
