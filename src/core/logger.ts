/**
 * Logging contract. Components log through `console` unless told otherwise.
 * @module core/logger
 */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/** Logger that drops everything; handy for tests and embedding. */
export const silentLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
