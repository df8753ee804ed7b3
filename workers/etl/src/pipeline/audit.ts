import { AUDIT_STATUSES } from '@petalbrew/shared';
import type { AuditSink } from '../warehouse/types';

export const STARTED_MESSAGE = 'Beginning shop analytics ETL process';

/**
 * Audit trail of one run: a single STARTED entry, any number of INFO
 * entries, then exactly one COMPLETED or FAILED entry.
 */
export class AuditTrail {
  private start: Date | null = null;
  private closed = false;

  constructor(
    private readonly sink: AuditSink,
    private readonly procedureName: string,
    private readonly clock: () => Date,
  ) {}

  /** Start time of the run; set by `started()`. */
  get startTime(): Date {
    if (!this.start) throw new Error('Audit trail has not been started');
    return this.start;
  }

  async started(): Promise<Date> {
    const startTime = this.clock();
    this.start = startTime;
    await this.sink.record({
      procedureName: this.procedureName,
      startTime,
      endTime: null,
      status: AUDIT_STATUSES.STARTED,
      message: STARTED_MESSAGE,
    });
    return startTime;
  }

  async info(message: string): Promise<void> {
    await this.sink.record({
      procedureName: this.procedureName,
      startTime: this.clock(),
      endTime: null,
      status: AUDIT_STATUSES.INFO,
      message,
    });
  }

  /** Close the run successfully; returns its end time. */
  async completed(): Promise<Date> {
    const startTime = this.startTime;
    const endTime = this.clock();
    const seconds = Math.floor((endTime.getTime() - startTime.getTime()) / 1000);
    await this.close({
      startTime,
      endTime,
      status: AUDIT_STATUSES.COMPLETED,
      message: `Shop analytics ETL completed successfully in ${seconds} seconds`,
    });
    return endTime;
  }

  async failed(message: string): Promise<void> {
    const startTime = this.startTime;
    const endTime = this.clock();
    await this.close({
      startTime,
      endTime,
      status: AUDIT_STATUSES.FAILED,
      message,
    });
  }

  private async close(entry: {
    startTime: Date;
    endTime: Date;
    status: typeof AUDIT_STATUSES.COMPLETED | typeof AUDIT_STATUSES.FAILED;
    message: string;
  }): Promise<void> {
    if (this.closed) throw new Error('Audit trail is already closed');
    await this.sink.record({ procedureName: this.procedureName, ...entry });
    this.closed = true;
  }
}
