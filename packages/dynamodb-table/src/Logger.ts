/**
 * The subset of `console` used to report lifecycle operations.
 */
export interface Logger {
    debug(message: string, ...meta: Array<unknown>): void;
    info(message: string, ...meta: Array<unknown>): void;
}

export const noopLogger: Logger = {
    debug: () => undefined,
    info: () => undefined,
};
