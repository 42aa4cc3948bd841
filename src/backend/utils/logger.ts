/**
 * Logger
 *
 * Level-filtered console logging with one named instance per module.
 * Output format: `<timestamp> | <LEVEL> | <name> | <message>`
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: LogLevel[] = ['debug', 'info', 'warn', 'error'];

let minimumLevel: LogLevel = 'info';

/**
 * Set the process-wide minimum level. Called once at startup.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(minimumLevel);
}

export class Logger {
  constructor(private readonly name: string) {}

  debug(message: string, ...details: unknown[]): void {
    this.write('debug', message, details);
  }

  info(message: string, ...details: unknown[]): void {
    this.write('info', message, details);
  }

  warn(message: string, ...details: unknown[]): void {
    this.write('warn', message, details);
  }

  error(message: string, ...details: unknown[]): void {
    this.write('error', message, details);
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (!isLevelEnabled(level)) {
      return;
    }

    const line = `${new Date().toISOString()} | ${level.toUpperCase().padEnd(5)} | ${this.name} | ${message}`;

    switch (level) {
      case 'error':
        console.error(line, ...details);
        break;
      case 'warn':
        console.warn(line, ...details);
        break;
      default:
        console.log(line, ...details);
    }
  }
}

export function createLogger(name: string): Logger {
  return new Logger(name);
}
