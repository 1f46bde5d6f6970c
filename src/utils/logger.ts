import pino, { type Logger } from 'pino';
import pinoPretty from 'pino-pretty';

/** Build the process logger; pretty output unless PRETTY_LOGS=false */
function createLogger(): Logger {
  const pretty = String(process.env.PRETTY_LOGS ?? 'true').toLowerCase() === 'true';
  const options = {
    level: process.env.LOG_LEVEL ?? 'info',
    base: { service: 'label-print-server' },
  };

  if (!pretty) {
    return pino(options);
  }

  return pino(
    options,
    pinoPretty({
      translateTime: 'SYS:standard',
      colorize: true,
      ignore: 'pid,hostname,service',
    })
  );
}

export const logger = createLogger();
