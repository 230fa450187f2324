import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';

export interface HealthReport {
  status: 'ok' | 'critical';
  database: 'ok' | 'error';
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: { query(sql: string): Promise<unknown> },
  ) {}

  async check(): Promise<HealthReport> {
    try {
      await this.dataSource.query('SELECT 1');
      return { status: 'ok', database: 'ok' };
    } catch (e) {
      this.logger.error('DB health check failed', e instanceof Error ? e.message : String(e));
      return { status: 'critical', database: 'error' };
    }
  }
}
