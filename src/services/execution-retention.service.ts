import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CronJob } from 'cron';
import { StateMachineEventType } from '../events/state-machine-event-type.enum';
import type { ExecutionsPurgedEvent } from '../events/state-machine-events';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { ResolvedStateMachineModuleOptions } from '../interfaces/state-machine-module-options.interface';
import {
  EXECUTION_STORE,
  STATE_MACHINE_MODULE_OPTIONS,
} from '../state-machine.constants';

export interface RetentionSweepResult {
  cutoff: Date;
  purged: string[];
  durationMs: number;
}

const MS_PER_MINUTE = 60_000;

@Injectable()
export class ExecutionRetentionService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ExecutionRetentionService.name);
  private job: CronJob | undefined;

  constructor(
    @Inject(EXECUTION_STORE) private readonly store: IExecutionStore,
    private readonly eventEmitter: EventEmitter2,
    @Inject(STATE_MACHINE_MODULE_OPTIONS)
    private readonly options: ResolvedStateMachineModuleOptions,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableRetentionCron) {
      this.logger.log('Execution retention cron disabled by configuration');
      return;
    }

    this.job = new CronJob(this.options.retentionCronExpression, () => {
      this.purgeExpired()
        .then((result) => {
          if (result.purged.length > 0) {
            this.logger.log(
              `Retention sweep purged ${result.purged.length} execution(s) stopped before ${result.cutoff.toISOString()}, durationMs=${result.durationMs}`,
            );
          }
        })
        .catch((err) => {
          this.logger.error('Unhandled error in retention cron', err);
        });
    });
    this.job.start();
    this.logger.log(
      `Retention cron registered with expression: ${this.options.retentionCronExpression}`,
    );
  }

  onModuleDestroy(): void {
    this.job?.stop();
    this.job = undefined;
  }

  /** Deletes terminal executions that stopped more than `retentionMinutes` ago. */
  async purgeExpired(now: Date = new Date()): Promise<RetentionSweepResult> {
    const startedAt = Date.now();
    const cutoff = new Date(
      now.getTime() - this.options.retentionMinutes * MS_PER_MINUTE,
    );
    const purged: string[] = [];

    for (const executionId of await this.store.findStoppedBefore(cutoff)) {
      if (await this.store.delete(executionId)) {
        purged.push(executionId);
      }
    }

    if (purged.length > 0) {
      try {
        this.eventEmitter.emit(StateMachineEventType.EXECUTIONS_PURGED, {
          executionIds: purged,
          cutoff,
          timestamp: new Date(),
        } satisfies ExecutionsPurgedEvent);
      } catch (error) {
        this.logger.error(
          'Retention side effects failed',
          error instanceof Error ? error.stack : error,
        );
      }
    }

    return {
      cutoff,
      purged,
      durationMs: Date.now() - startedAt,
    };
  }
}
