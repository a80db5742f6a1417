/**
 * SQL utility functions for security and validation
 * Prevents SQL injection through identifier names (table names, column names, aliases)
 */
import { ValidationError } from './errors.js';

/**
 * Valid SQL identifier pattern
 * Identifiers must:
 * - Start with a letter or underscore
 * - Contain only alphanumeric characters and underscores
 */
const VALID_IDENTIFIER_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Maximum length for identifiers to prevent DoS via excessively long names
 */
const MAX_IDENTIFIER_LENGTH = 128;

/**
 * Validates a SQL identifier (table name, column name, alias)
 * @param type Description of what type of identifier this is (for error messages)
 * @returns The validated identifier (unchanged if valid)
 * @throws ValidationError if the identifier is invalid
 */
export function validateIdentifier(identifier: string, type: string = 'identifier'): string {
    if (!identifier || typeof identifier !== 'string') {
        throw new ValidationError(`Invalid ${type}: must be a non-empty string`);
    }

    if (identifier.length > MAX_IDENTIFIER_LENGTH) {
        throw new ValidationError(
            `Invalid ${type}: exceeds maximum length of ${MAX_IDENTIFIER_LENGTH} characters`
        );
    }

    if (!VALID_IDENTIFIER_REGEX.test(identifier)) {
        throw new ValidationError(
            `Invalid ${type} '${sanitizeForErrorMessage(identifier)}': must start with a letter or underscore, ` +
            `and contain only alphanumeric characters and underscores`,
            { identifier }
        );
    }

    return identifier;
}

export function isValidIdentifier(identifier: string): boolean {
    return (
        identifier.length > 0 &&
        identifier.length <= MAX_IDENTIFIER_LENGTH &&
        VALID_IDENTIFIER_REGEX.test(identifier)
    );
}

/**
 * Quotes a SQL identifier with double quotes (SQL standard, understood by SQLite and PostgreSQL).
 * The identifier is validated first, so it can never carry a quote of its own.
 */
export function quoteIdentifier(identifier: string): string {
    validateIdentifier(identifier, 'identifier');
    return `"${identifier}"`;
}

/**
 * Validates a database file path
 * Prevents path traversal attacks
 * @throws ValidationError if the path is potentially malicious
 */
export function validateDatabasePath(path: string | undefined): string | undefined {
    if (!path) return path;

    // Allow special memory path
    if (path === ':memory:') return path;

    // For file paths, prevent path traversal
    if (path.includes('..')) {
        throw new ValidationError('Invalid database path: path traversal (..) is not allowed');
    }

    // Check for null bytes (common injection technique)
    if (path.includes('\0')) {
        throw new ValidationError('Invalid database path: null bytes are not allowed');
    }

    // Check for shell metacharacters (but allow backslash for Windows paths)
    const dangerousChars = ['|', '&', ';', '$', '`', '>', '<', '!'];
    for (const char of dangerousChars) {
        if (path.includes(char)) {
            throw new ValidationError(`Invalid database path: character '${char}' is not allowed`);
        }
    }

    return path;
}

/**
 * Sanitizes a value for safe inclusion in error messages
 * Dangerous characters are replaced with look-alikes rather than removed entirely.
 */
export function sanitizeForErrorMessage(value: unknown, maxLength: number = 100): string {
    if (value === null) return 'null';
    if (value === undefined) return 'undefined';

    let str: string;

    if (typeof value === 'string') {
        str = value;
    } else if (typeof value === 'object') {
        try {
            str = JSON.stringify(value);
        } catch {
            str = '[Object]';
        }
    } else {
        str = String(value);
    }

    // Truncate long strings first
    if (str.length > maxLength) {
        str = str.substring(0, maxLength) + '...';
    }

    str = str
        .replace(/</g, '\u2039')    // < -> single left-pointing angle quotation mark
        .replace(/>/g, '\u203a')    // > -> single right-pointing angle quotation mark
        .replace(/"/g, '\u201c')    // " -> left double quotation mark
        .replace(/'/g, '\u2019')    // ' -> right single quotation mark
        .replace(/&/g, '\uff06')    // & -> fullwidth ampersand
        .replace(/;/g, '\u037e');   // ; -> greek question mark

    return str;
}
