export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  action?: string;
  metadata?: Record<string, unknown>;
  error?: Error;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

class Logger {
  private get threshold(): LogLevel {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
    return isLogLevel(configured) ? configured : 'info';
  }

  private get useColor(): boolean {
    return process.env.NODE_ENV === 'development' && process.stdout.isTTY === true;
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(serializeContext(context))}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) {
      return;
    }

    const formattedMessage = this.formatMessage(level, message, context);
    const color = this.useColor;

    switch (level) {
      case 'debug':
        console.debug(color ? `\x1b[36m${formattedMessage}\x1b[0m` : formattedMessage); // Cyan
        break;
      case 'info':
        console.info(color ? `\x1b[32m${formattedMessage}\x1b[0m` : formattedMessage); // Green
        break;
      case 'warn':
        console.warn(color ? `\x1b[33m${formattedMessage}\x1b[0m` : formattedMessage); // Yellow
        break;
      case 'error':
        console.error(color ? `\x1b[31m${formattedMessage}\x1b[0m` : formattedMessage); // Red
        break;
    }
  }

  debug(message: string, context?: LogContext) {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext) {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext) {
    this.log('error', message, context);

    // Log the error stack trace if available
    if (context?.error?.stack && LEVEL_ORDER[this.threshold] <= LEVEL_ORDER.error) {
      console.error(context.error.stack);
    }
  }
}

// Error instances stringify to {} so keep name and message explicitly
function serializeContext(context: LogContext): Record<string, unknown> {
  const { error, ...rest } = context;
  if (!error) {
    return rest;
  }
  return { ...rest, error: { name: error.name, message: error.message } };
}

// Export singleton instance
export const logger = new Logger();
