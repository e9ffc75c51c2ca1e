import type { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';

const middlewareExpressValidator = (
    req: Request,
    res: Response,
    next: NextFunction,
) => {
    const result = validationResult(req);
    if (result.isEmpty()) {
        return next();
    }
    return res.status(400).json({
        success: '',
        error: 'Validation failed',
        data: {
            errors: result.array()
        },
    });
};

export default middlewareExpressValidator;
