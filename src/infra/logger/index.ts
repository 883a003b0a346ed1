/**
 * Run logger for the catalog CLI.
 *
 * Each metric logs through a child carrying its output name. Log lines go to
 * stderr so stdout stays free for the run summary and query output.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'electrification-metrics',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Creates the root logger; pretty-printed unless running in production.
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
    return pinoLib(options);
  }

  return pinoLib(options, pinoLib.destination(2));
};

export { type Logger } from 'pino';
