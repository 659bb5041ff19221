const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/**
 * Validates a lower-case SQL identifier used for savepoints and notification
 * channels. The name is returned as-is so it can be spliced into a statement.
 */
export function sanitizeIdentifier(name: string): string {
    if (name.length === 0 || name.length > 63 || !IDENTIFIER.test(name)) {
        throw new Error(`Invalid identifier: ${JSON.stringify(name)}`);
    }
    return name;
}
