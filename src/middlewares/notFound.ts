import { Request, Response } from 'express';

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: {
      code: 'route_not_found',
      message: `No route for ${req.method} ${req.path}`
    }
  });
};
