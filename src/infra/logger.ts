export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

function stamp(level: string, message: string): string {
  return `[${new Date().toISOString()}] ${level} ${message}`;
}

export const consoleLogger: Logger = {
  info: message => console.log(stamp('INFO', message)),
  warn: message => console.warn(stamp('WARN', message)),
  error: (message, err) => {
    if (err === undefined) console.error(stamp('ERROR', message));
    else console.error(stamp('ERROR', message), err);
  }
};
