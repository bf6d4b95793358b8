import type { LogContext, LoggerPort, LogLevel } from '../../application/ports/LoggerPort.js';
import type { LogThreshold } from '../config/Config.js';

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX: Record<LogLevel, string> = {
  debug: '🔍',
  info: '✅',
  warn: '⚠️',
  error: '❌',
};

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly threshold: LogThreshold = 'info') {}

  debug(event: string, context?: LogContext): void {
    this.write('debug', event, context);
  }

  info(event: string, context?: LogContext): void {
    this.write('info', event, context);
  }

  warn(event: string, context?: LogContext): void {
    this.write('warn', event, context);
  }

  error(event: string, context?: LogContext): void {
    this.write('error', event, context);
  }

  private write(level: LogLevel, event: string, context?: LogContext): void {
    if (SEVERITY[level] < SEVERITY[this.threshold]) {
      return;
    }

    const line = `${PREFIX[level]} ${event}`;
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    if (context && Object.keys(context).length) {
      sink(line, context);
    } else {
      sink(line);
    }
  }
}
