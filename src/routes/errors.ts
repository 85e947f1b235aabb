/**
 * JSON error response utilities.
 */

import type { Context } from 'hono';

/**
 * Error codes returned in JSON error bodies.
 */
export enum ErrorCode {
    INVALID_REQUEST = 'INVALID_REQUEST',
    UNAUTHORIZED = 'UNAUTHORIZED',
    NOT_FOUND = 'NOT_FOUND',
    RATE_LIMITED = 'RATE_LIMITED',
    INTERNAL = 'INTERNAL',
}

/**
 * Error response body.
 */
export interface ErrorResponse {
    code: ErrorCode;
    message: string;
    details?: Record<string, string>;
}

export type ErrorStatus = 400 | 401 | 404 | 429 | 500;

/**
 * Create a JSON error response.
 */
export function errorResponse(
    c: Context,
    status: ErrorStatus,
    code: ErrorCode,
    message: string,
    details?: Record<string, string>
): Response {
    const body: ErrorResponse = { code, message };
    if (details) {
        body.details = details;
    }
    return c.json(body, status);
}

/**
 * Common error responses.
 */
export const errors = {
    invalidRequest: (c: Context, message: string, details?: Record<string, string>) =>
        errorResponse(c, 400, ErrorCode.INVALID_REQUEST, message, details),

    unauthorized: (c: Context, message = 'Invalid API key. Please authenticate at /') =>
        errorResponse(c, 401, ErrorCode.UNAUTHORIZED, message),

    notFound: (c: Context, message = 'Resource not found') =>
        errorResponse(c, 404, ErrorCode.NOT_FOUND, message),

    internal: (c: Context, message = 'Internal server error') =>
        errorResponse(c, 500, ErrorCode.INTERNAL, message),
};
