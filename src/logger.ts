import { pino, type Logger } from 'pino';
import { type Config, loadConfig } from './config.js';

let shared: Logger | undefined;

export function createLogger(config: Config = loadConfig()): Logger {
    return pino({ name: 'treegen', level: config.logLevel });
}

/**
 * Logger used by generators created without one. Built on first use from
 * the environment.
 */
export function defaultLogger(): Logger {
    shared ??= createLogger();
    return shared;
}
