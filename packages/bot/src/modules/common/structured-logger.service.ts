import { Injectable, LoggerService } from '@nestjs/common';

export interface LogContext {
  nodeId?: string;
  sessionNumber?: number;
  roundId?: string;
  action?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface StructuredLog {
  timestamp: string;
  service: string;
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logging structuré : une ligne JSON par événement, lisible par n'importe quel collecteur
 * (journalctl, Loki, ELK...). Le bot tourne souvent sur un Raspberry Pi à côté du nœud radio.
 */
@Injectable()
export class StructuredLoggerService implements LoggerService {
  private serviceName: string;

  constructor(serviceName = 'mesh-jeopardy') {
    this.serviceName = serviceName;
  }

  private formatLog(level: StructuredLog['level'], message: string, scope?: LogContext | string, error?: Error): string {
    // Les logs internes de Nest passent le nom de la classe en contexte
    const context = typeof scope === 'string' ? { scope } : scope;
    const log: StructuredLog = {
      timestamp: new Date().toISOString(),
      service: this.serviceName,
      level,
      message,
    };

    if (context && Object.keys(context).length > 0) {
      log.context = context;
    }

    if (error) {
      log.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return JSON.stringify(log);
  }

  log(message: string, context?: LogContext | string) {
    console.log(this.formatLog('info', message, context));
  }

  info(message: string, context?: LogContext | string) {
    console.log(this.formatLog('info', message, context));
  }

  debug(message: string, context?: LogContext | string) {
    if (process.env.NODE_ENV !== 'production') {
      console.debug(this.formatLog('debug', message, context));
    }
  }

  warn(message: string, context?: LogContext | string) {
    console.warn(this.formatLog('warn', message, context));
  }

  error(message: string, error?: unknown, context?: LogContext | string) {
    console.error(this.formatLog('error', message, context, toError(error)));
  }

  logSessionAction(action: string, sessionNumber: number, context?: LogContext) {
    this.info(`Session ${action}`, {
      ...context,
      sessionNumber,
      action: `session_${action}`,
    });
  }

  logMeshPacket(direction: 'in' | 'out', nodeOrChannel: string, context?: LogContext) {
    this.debug(`Mesh ${direction}`, {
      ...context,
      nodeId: nodeOrChannel,
      action: `mesh_${direction}`,
    });
  }

  logDatabaseQuery(operation: string, table: string, durationMs: number, context?: LogContext) {
    this.debug(`DB ${operation} on ${table}`, {
      ...context,
      action: 'database_query',
      duration: durationMs,
    });
  }
}

export function toError(error: unknown): Error | undefined {
  if (error === undefined || error === null) return undefined;
  if (error instanceof Error) return error;
  return new Error(String(error));
}

// Singleton pour utilisation simple
export const logger = new StructuredLoggerService();
