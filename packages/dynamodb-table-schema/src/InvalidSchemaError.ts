/**
 * An error thrown when a table or index declaration cannot be rendered into
 * a valid CreateTable request. The rejected value is included as `value`.
 */
export class InvalidSchemaError extends Error {
    readonly name = 'InvalidSchemaError';

    constructor(public readonly value: unknown, message?: string) {
        super(message);
    }
}
