export type Logger = (message: string) => void;

export interface LoggerOptions {
  detail?: string | undefined;
  level?: 'info' | 'warn';
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${scope}${options.detail ? `:${options.detail}` : ''}]`;
  if (options.level === 'warn') {
    return (message: string) => console.warn(`${prefix} ${message}`);
  }
  return (message: string) => console.log(`${prefix} ${message}`);
}
