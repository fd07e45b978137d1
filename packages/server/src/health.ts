// Health check endpoint
import type { HealthStatus } from '@datcom/shared';

export type { HealthStatus };

export class HealthChecker {
  private startTime: number;

  constructor(
    private readonly datacommonsConfigured: boolean,
    private readonly toolCount: number,
  ) {
    this.startTime = Date.now();
  }

  check(): HealthStatus {
    return {
      status: this.datacommonsConfigured ? 'ok' : 'error',
      datacommons: this.datacommonsConfigured ? 'configured' : 'unconfigured',
      tools: this.toolCount,
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
    };
  }
}
