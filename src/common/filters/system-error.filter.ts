import {
  Catch,
  type ExceptionFilter,
  type ArgumentsHost,
  Logger,
} from '@nestjs/common';
import { SystemError } from '../errors/system-error.js';
import { SystemHealthError } from '../errors/system-health-error.js';
import { getCorrelationId } from '../services/correlation-context.js';

type SystemErrorSeverity = SystemError['severity'];

const STATUS_BY_SEVERITY: Record<SystemErrorSeverity, number> = {
  critical: 500,
  error: 500,
  warning: 400,
};

@Catch(SystemError)
export class SystemErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(SystemErrorFilter.name);

  catch(exception: SystemError, host: ArgumentsHost): void {
    const logEntry = {
      message: exception.message,
      code: exception.code,
      severity: exception.severity,
      errorName: exception.name,
      component:
        exception instanceof SystemHealthError
          ? exception.component
          : undefined,
      metadata: exception.metadata,
      correlationId: getCorrelationId(),
      module: 'system-error-filter',
    };
    if (exception.severity === 'warning') {
      this.logger.warn(logEntry);
    } else {
      this.logger.error({ ...logEntry, stack: exception.stack });
    }

    // Non-HTTP contexts (cron, interval) only get the log line
    if (host.getType() !== 'http') {
      return;
    }

    const ctx = host.switchToHttp();
    const response: {
      status: (code: number) => { send: (body: unknown) => void };
    } = ctx.getResponse();

    void response.status(STATUS_BY_SEVERITY[exception.severity]).send({
      error: {
        code: exception.code,
        message: exception.message,
        severity: exception.severity,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
