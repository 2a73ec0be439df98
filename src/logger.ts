const PREFIX = '[glance]';

type LogLevel = 'debug' | 'warn' | 'error';

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

function formatData(data: unknown): string {
  if (data === undefined) return '';
  if (data instanceof Error) return data.stack ?? `${data.name}: ${data.message}`;
  if (typeof data === 'object') {
    try {
      return JSON.stringify(data);
    } catch {
      return String(data);
    }
  }
  return String(data);
}

// stdout belongs to the screen, so every level goes to stderr
function log(level: LogLevel, module: string, message: string, data?: unknown): void {
  if (level === 'debug' && !debugEnabled) return;
  const timestamp = new Date().toISOString().split('T')[1]?.slice(0, 12);
  const prefix = `${PREFIX}[${timestamp}][${module}]`;
  const formatted = data !== undefined ? `${message} ${formatData(data)}` : message;

  switch (level) {
    case 'warn':
      console.warn(`${prefix} ${formatted}`);
      break;
    default:
      console.error(`${prefix} ${formatted}`);
      break;
  }
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function createLogger(module: string): Logger {
  return {
    debug: (message, data) => log('debug', module, message, data),
    warn: (message, data) => log('warn', module, message, data),
    error: (message, data) => log('error', module, message, data),
  };
}
