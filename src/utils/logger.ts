import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type Level = 'error' | 'warn' | 'info' | 'http' | 'debug';

const levelStyles: Record<Level, { tag: chalk.Chalk; text: chalk.Chalk; icon: string }> = {
  error: { tag: chalk.red, text: chalk.redBright, icon: '❌' },
  warn: { tag: chalk.yellow, text: chalk.yellowBright, icon: '⚠️ ' },
  info: { tag: chalk.blue, text: chalk.blueBright, icon: 'ℹ️ ' },
  http: { tag: chalk.magenta, text: chalk.magentaBright, icon: '🌐' },
  debug: { tag: chalk.cyan, text: chalk.cyanBright, icon: '🔍' },
};

const isLevel = (level: string): level is Level => level in levelStyles;

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const style = isLevel(level)
    ? levelStyles[level]
    : { tag: chalk.white, text: chalk.whiteBright, icon: '📝' };

  const head = `${chalk.gray(`[${String(ts)}]`)} ${style.icon} ${style.tag(`[${level.toUpperCase()}]`)}`;

  if (stack) {
    return `${head}\n${chalk.red(String(stack))}`;
  }

  return `${head} ${typeof message === 'string' ? style.text(message) : String(message)}`;
});

const fileFormat = printf(
  ({ level, message, timestamp: ts, stack }) =>
    `${String(ts)} [${level.toUpperCase()}]: ${String(stack ?? message)}`
);

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true })),
  defaultMeta: { service: 'client-reconciliation' },
  transports: [
    new winston.transports.Console({
      format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), colorizedFormat),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  const persisted = combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), fileFormat);
  logger.add(new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: persisted }));
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', format: persisted }));
}

const toMessage = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static facade over the winston logger. Objects are pretty-printed as JSON.
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(toMessage(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(toMessage(args));
  };

  public static error = (args: unknown): void => {
    logger.error(toMessage(args));
  };

  public static debug = (args: unknown): void => {
    logger.debug(toMessage(args));
  };

  public static http = (args: unknown): void => {
    logger.http(toMessage(args));
  };

  public static success = (args: unknown): void => {
    const ts = new Date().toISOString().replace('T', ' ').substring(0, 19);
    // eslint-disable-next-line no-console
    console.log(chalk.gray(`[${ts}]`), '✅', chalk.green('[SUCCESS]'), chalk.greenBright(toMessage(args)));
  };

  // Framed banner, one body line per entry
  public static box = (title: string, ...lines: string[]): void => {
    const width = Math.max(50, title.length + 2, ...lines.map((line) => line.length + 2));
    const rule = '═'.repeat(width);
    const row = (text: string, style: chalk.Chalk): string =>
      chalk.cyan('║') + style(` ${text.padEnd(width - 1)}`) + chalk.cyan('║');

    // eslint-disable-next-line no-console
    console.log(
      [
        chalk.cyan(`╔${rule}╗`),
        row(title, chalk.bold.cyanBright),
        chalk.cyan(`╠${rule}╣`),
        ...lines.map((line) => row(line, chalk.white)),
        chalk.cyan(`╚${rule}╝`),
      ].join('\n')
    );
  };
}

export default logger;
