/**========================================================================
 **                          ERROR TAXONOMY
 *? domain errors carry their own status + code
 *? anything else is translated to an internal error at the boundary
 *========================================================================**/

export interface ErrorBody {
    error: {
        code: string;
        message: string;
        details: string | null;
    };
}

export class AppError extends Error {
    constructor(
        readonly statusCode: number,
        readonly code: string,
        message: string,
        readonly details: string | null = null
    ) {
        super(message);
        this.name = new.target.name;
    }

    toBody(): ErrorBody {
        return {
            error: {
                code: this.code,
                message: this.message,
                details: this.details
            }
        };
    }
}

export class BadRequestError extends AppError {
    constructor(message: string, details: string | null = null) {
        super(400, 'BAD_REQUEST', message, details);
    }
}

export class ValidationError extends AppError {
    constructor(details: string) {
        super(400, 'VALIDATION_ERROR', 'Invalid request data', details);
    }
}

export class UnauthorizedError extends AppError {
    constructor(message = 'Not authenticated') {
        super(401, 'UNAUTHORIZED', message);
    }
}

export class ForbiddenError extends AppError {
    constructor(message: string) {
        super(403, 'FORBIDDEN', message);
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(404, 'NOT_FOUND', message);
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        // duplicates are a bad request, told apart by code
        super(400, 'CONFLICT', message);
    }
}

export class InternalError extends AppError {
    constructor(message = 'An unexpected error occurred', details: string | null = null) {
        super(500, 'INTERNAL_SERVER_ERROR', message, details);
    }
}

// codes for the 4xx statuses fastify and its plugins raise; any other 4xx becomes a plain 400
const CLIENT_ERROR_CODES: Record<number, string> = {
    400: 'BAD_REQUEST',
    401: 'UNAUTHORIZED',
    403: 'FORBIDDEN',
    404: 'NOT_FOUND',
    406: 'NOT_ACCEPTABLE',
    413: 'PAYLOAD_TOO_LARGE',
    415: 'UNSUPPORTED_MEDIA_TYPE'
};

function hasStatusCode(err: unknown): err is Error & { statusCode: number } {
    return err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number';
}

function isSchemaValidationError(err: unknown): err is Error & { validation: unknown[] } {
    return err instanceof Error && 'validation' in err && Array.isArray(err.validation);
}

// map any thrown value onto the taxonomy
export function translateError(
    err: unknown,
    fallbackMessage = 'An unexpected error occurred',
    exposeDetails = false
): AppError {
    if (err instanceof AppError) {
        return err;
    }

    if (isSchemaValidationError(err)) {
        return new ValidationError(err.message);
    }

    // fastify + plugin errors (bad json body, multipart limits, ...)
    if (hasStatusCode(err) && err.statusCode >= 400 && err.statusCode < 500) {
        const code: string | undefined = CLIENT_ERROR_CODES[err.statusCode];
        return code
            ? new AppError(err.statusCode, code, err.message)
            : new BadRequestError(err.message);
    }

    const details = exposeDetails && err instanceof Error ? err.message : null;
    return new InternalError(fallbackMessage, details);
}
