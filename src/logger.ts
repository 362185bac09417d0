export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
}

export function createConsoleLogger(tag = 'access-tripwire'): Logger {
  return {
    info: (msg) => console.log(msg),
    warn: (msg) => console.error(`[${tag}] ${msg}`),
    error: (msg) => console.error(`[${tag}] ${msg}`),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
