import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const pretty = !isProduction && process.env.PLAYPUSH_LOG_PRETTY !== 'false';
const level = process.env.PLAYPUSH_LOG_LEVEL ?? 'info';

// stdout is reserved for command output, logs go to stderr
export const logger = pretty
  ? pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { destination: 2 },
      },
    })
  : pino({ level }, pino.destination(2));

export function createLogger(name: string) {
  return logger.child({ component: name });
}
