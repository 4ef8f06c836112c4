import { Request, Response } from 'express';
import type { APIResponse } from '../../../shared/types/api';

export const notFoundHandler = (req: Request, res: Response) => {
  const body: APIResponse<never> = {
    success: false,
    error: {
      code: 'ROUTE_NOT_FOUND',
      message: `No route for ${req.method} ${req.path}`,
    },
    timestamp: new Date().toISOString(),
  };
  res.status(404).json(body);
};
