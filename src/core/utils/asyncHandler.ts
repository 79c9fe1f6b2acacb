import type { Request, Response, NextFunction, RequestHandler } from 'express'

/**
 * Wrap an async Express handler so rejections reach the error middleware
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
    return (req, res, next) => {
        Promise.resolve(fn(req, res, next)).catch(next)
    }
}
