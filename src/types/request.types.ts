import { NextFunction, Request, Response } from 'express';

/**
 * Route params for `/:id` style routes
 */
export type IdParams = { id: string };

/**
 * Express 4 does not forward rejected promises; every async handler is
 * wrapped so failures reach the error middleware.
 */
export type AsyncHandler<P = Record<string, string>> = (
  req: Request<P>,
  res: Response,
  next: NextFunction
) => Promise<unknown>;
