import { Injectable, Scope } from '@nestjs/common';
import { PinoLogger, InjectPinoLogger } from 'nestjs-pino';
import { PipelineStageName } from '../errors/pipeline.errors';

/**
 * Pipeline logger on top of Pino.
 * Stage events carry the run id so one run can be followed across stages.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService {
  constructor(@InjectPinoLogger() private readonly logger: PinoLogger) {}

  setContext(context: string) {
    this.logger.setContext(context);
  }

  log(message: string, ...args: unknown[]) {
    this.logger.info(message, ...args);
  }

  error(message: string, trace?: string) {
    if (trace) {
      this.logger.error({ trace }, message);
    } else {
      this.logger.error(message);
    }
  }

  warn(message: string, ...args: unknown[]) {
    this.logger.warn(message, ...args);
  }

  debug(message: string, ...args: unknown[]) {
    this.logger.debug(message, ...args);
  }

  logStageStart(stage: PipelineStageName, runId: string) {
    this.logger.info({ event: 'stage.start', stage, runId }, `Stage started: ${stage}`);
  }

  logStageComplete(
    stage: PipelineStageName,
    runId: string,
    duration: number,
    summary: Record<string, unknown>,
  ) {
    this.logger.info(
      { event: 'stage.complete', stage, runId, duration, ...summary },
      `Stage completed: ${stage} (${duration}ms)`,
    );
  }

  logStageFailed(
    stage: PipelineStageName,
    runId: string,
    error: Error,
    duration: number,
  ) {
    this.logger.error(
      {
        event: 'stage.failed',
        stage,
        runId,
        duration,
        error: {
          message: error.message,
          name: error.name,
          stack: error.stack,
        },
      },
      `Stage failed: ${stage} - ${error.message}`,
    );
  }

  /** Counts worth alerting on, such as records dropped during cleansing */
  logBusinessEvent(
    eventName: string,
    metadata: Record<string, unknown>,
    message?: string,
  ) {
    this.logger.info(
      { event: `business.${eventName}`, ...metadata },
      message ?? eventName,
    );
  }

  logPerformance(
    operation: string,
    duration: number,
    metadata?: Record<string, unknown>,
  ) {
    this.logger.info(
      { event: 'performance', operation, duration, ...metadata },
      `${operation} completed in ${duration}ms`,
    );
  }

  logExternalCall(
    service: string,
    operation: string,
    duration: number,
    success: boolean,
    metadata?: Record<string, unknown>,
  ) {
    const level = success ? 'info' : 'warn';
    this.logger[level](
      { event: 'external.call', service, operation, duration, success, ...metadata },
      `${service}.${operation} ${success ? 'succeeded' : 'failed'} (${duration}ms)`,
    );
  }
}
