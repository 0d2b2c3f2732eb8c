import { NextFunction, Request, Response } from 'express';
import { AsyncHandler } from '../types/request.types';

export const asyncHandler = <P>(handler: AsyncHandler<P>) =>
  (req: Request<P>, res: Response, next: NextFunction): void => {
    handler(req, res, next).catch(next);
  };
