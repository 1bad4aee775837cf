import winston from 'winston';

/**
 * Winston Logger Configuration
 * Levels: ERROR, WARN, INFO, DEBUG
 * Components: cli, recipients, composer, sender, signer, bulk-mailer
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

// -v counts: 0 -> info, 1+ -> debug
const VERBOSITY_LEVELS: LogLevel[] = ['error', 'info', 'debug'];

let linePrefix = '';

const logFormat = winston.format.combine(
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, stack, component, ...metadata }) => {
    const comp = component ? `[${component}]` : '';
    let log = `${linePrefix}[${level.toUpperCase()}]${comp} ${message}`;

    const metaKeys = Object.keys(metadata).filter(k => !['service', 'level'].includes(k));
    if (metaKeys.length > 0) {
      const metaObj: Record<string, unknown> = {};
      metaKeys.forEach(k => metaObj[k] = metadata[k]);
      log += ` ${JSON.stringify(metaObj)}`;
    }

    if (stack) {
      log += `\n${stack}`;
    }

    return log;
  })
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'bulk-mailer' },
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
    }),
  ],
});

/**
 * Map the CLI verbosity count onto a log level and set the dry-run prefix.
 * `defaultLevel` (from LOG_LEVEL) applies only when no -v flag was given.
 */
export function configureLogger(options: {
  verbosity: number;
  dryRun: boolean;
  defaultLevel?: LogLevel;
}): LogLevel {
  const level =
    options.verbosity === 0 && options.defaultLevel
      ? options.defaultLevel
      : VERBOSITY_LEVELS[Math.min(VERBOSITY_LEVELS.length - 1, options.verbosity + 1)];
  logger.level = level;
  linePrefix = options.dryRun ? '(DRY RUN) ' : '';
  return level;
}

export function isDebugEnabled(): boolean {
  return logger.isDebugEnabled();
}

export const cliLogger = logger.child({ component: 'cli' });
export const recipientsLogger = logger.child({ component: 'recipients' });
export const composerLogger = logger.child({ component: 'composer' });
export const senderLogger = logger.child({ component: 'sender' });
export const signerLogger = logger.child({ component: 'signer' });
export const mailerLogger = logger.child({ component: 'bulk-mailer' });

export default logger;
