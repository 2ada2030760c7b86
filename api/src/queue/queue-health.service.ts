import { Injectable } from '@nestjs/common';
import type { Queue } from 'bullmq';

export interface QueueFailure {
  at: string;
  message: string;
}

export interface QueueHealthStatus {
  name: string;
  waiting: number;
  active: number;
  delayed: number;
  failed: number;
  /** Last run that failed for good, since the process started */
  lastFailure: QueueFailure | null;
}

/**
 * Job counts of the sync queues plus the last final failure of each,
 * reported by GET /health.
 */
@Injectable()
export class QueueHealthService {
  private readonly queues = new Map<string, Queue>();
  private readonly failures = new Map<string, QueueFailure>();

  /**
   * Register a queue for health monitoring.
   * Called by processors during onModuleInit.
   */
  register(queue: Queue): void {
    this.queues.set(queue.name, queue);
  }

  recordFailure(queueName: string, message: string): void {
    this.failures.set(queueName, {
      at: new Date(Date.now()).toISOString(),
      message,
    });
  }

  async getHealthStatus(): Promise<QueueHealthStatus[]> {
    const results: QueueHealthStatus[] = [];

    for (const [name, queue] of this.queues) {
      const counts = await queue.getJobCounts(
        'waiting',
        'active',
        'delayed',
        'failed',
      );
      results.push({
        name,
        waiting: counts.waiting ?? 0,
        active: counts.active ?? 0,
        delayed: counts.delayed ?? 0,
        failed: counts.failed ?? 0,
        lastFailure: this.failures.get(name) ?? null,
      });
    }

    return results;
  }
}
