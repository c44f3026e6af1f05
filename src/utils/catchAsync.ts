import { NextFunction, Request, RequestHandler, Response } from "express";

type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<void>;

/**
 * Forward rejections of an async handler to the error middleware
 */
export default function catchAsync(func: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    func(req, res, next).catch(next);
  };
}
