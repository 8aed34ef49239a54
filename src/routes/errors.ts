// src/routes/errors.ts

import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Logger } from '../services/base/types';
import { ValidationError, WorkroomError, errorMessage } from '../utils/errors';

/** Forwards a rejected handler promise to the error middleware. */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

export function parseBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown, what: string): T {
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) throw ValidationError.fromZod(parsed.error, what);
    return parsed.data;
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
    return (error: unknown, req, res, _next) => {
        if (error instanceof WorkroomError) {
            if (error.status >= 500) {
                logger.error('Request failed', { method: req.method, path: req.path, error: error.message });
            }
            res.status(error.status).json({ error: error.message });
            return;
        }
        if (error instanceof multer.MulterError) {
            res.status(error.code === 'LIMIT_FILE_SIZE' ? 413 : 400).json({ error: error.message });
            return;
        }
        if (error instanceof SyntaxError) {
            res.status(400).json({ error: 'Malformed JSON body' });
            return;
        }
        logger.error('Unhandled request error', { method: req.method, path: req.path, error: errorMessage(error) });
        res.status(500).json({ error: 'Internal server error' });
    };
}

export const notFound: RequestHandler = (req, res) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.path}` });
};
