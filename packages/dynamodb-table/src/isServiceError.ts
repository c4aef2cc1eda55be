/**
 * Whether the supplied error was raised by DynamoDB with the given error
 * code. Service exceptions carry their code as the error's `name`.
 */
export function isServiceError(err: unknown, code: string): err is Error {
    return err instanceof Error && err.name === code;
}
