import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../lib/errors';
import { errorResponse } from '../lib/response';

function isBodyParseError(err: Error): boolean {
    return err instanceof SyntaxError && 'body' in err;
}

/**
 * Renders every error passed to next() as a failure envelope.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
) {
    if (err instanceof ZodError) {
        return res.status(400).json(errorResponse('Validation Error', err.issues));
    }

    if (err instanceof AppError) {
        return res.status(err.statusCode).json(errorResponse(err.message));
    }

    if (isBodyParseError(err)) {
        return res.status(400).json(errorResponse('Malformed JSON body'));
    }

    console.error('Unhandled error:', err);
    return res.status(500).json(errorResponse('Internal Server Error'));
}
