import { Router, Response } from 'express';
import path from 'path';
import { z } from 'zod';
import type { APIResponse } from '../../../shared/types/api';
import { asyncHandler } from '../middleware/errorHandler';
import type { SessionController } from '../services/sessionController';
import { NotFoundError } from '../utils/errors';

const trimSchema = z.object({
  pairId: z.string().min(1),
  leftStart: z.number(),
  leftEnd: z.number(),
  rightStart: z.number(),
  rightEnd: z.number(),
});

// Outcome values are checked by the recorder against the session gates
const judgmentSchema = z.object({
  pairId: z.string().min(1),
  outcome: z.string().min(1),
});

const respond = <T>(res: Response, data: T, statusCode = 200) => {
  const body: APIResponse<T> = { success: true, data, timestamp: new Date().toISOString() };
  return res.status(statusCode).json(body);
};

export interface SessionRoutesOptions {
  videoFolder: string;
}

export const createSessionRoutes = (session: SessionController, options: SessionRoutesOptions) => {
  const sessionRoutes = Router();

  // GET /api/session/next-pair
  sessionRoutes.get('/next-pair', asyncHandler(async (req, res) => {
    respond(res, await session.nextPair());
  }));

  // GET /api/session/rewards/:pairId - debug mode only
  sessionRoutes.get('/rewards/:pairId', asyncHandler(async (req, res) => {
    respond(res, session.rewards(req.params.pairId));
  }));

  // POST /api/session/trim
  sessionRoutes.post('/trim', asyncHandler(async (req, res) => {
    const request = trimSchema.parse(req.body);
    respond(res, await session.trim(request));
  }));

  // POST /api/session/judgment
  sessionRoutes.post('/judgment', asyncHandler(async (req, res) => {
    const { pairId, outcome } = judgmentSchema.parse(req.body);
    const judgment = await session.judge(pairId, outcome);
    respond(res, { accepted: true, judgment }, 201);
  }));

  // POST /api/session/terminate
  sessionRoutes.post('/terminate', asyncHandler(async (req, res) => {
    const state = await session.terminate();
    respond(res, { state });
  }));

  // GET /api/session/status
  sessionRoutes.get('/status', asyncHandler(async (req, res) => {
    respond(res, session.status());
  }));

  // GET /api/session/config - lets the page show only the allowed controls
  sessionRoutes.get('/config', asyncHandler(async (req, res) => {
    respond(res, session.config);
  }));

  // GET /api/session/judgments
  sessionRoutes.get('/judgments', asyncHandler(async (req, res) => {
    respond(res, session.judgments());
  }));

  // GET /api/session/judgments/:pairId
  sessionRoutes.get('/judgments/:pairId', asyncHandler(async (req, res) => {
    respond(res, session.judgment(req.params.pairId));
  }));

  // GET /api/session/media/:trajectoryId
  sessionRoutes.get('/media/:trajectoryId', asyncHandler(async (req, res, next) => {
    const { trajectoryId } = req.params;
    const mediaPath = session.mediaPath(trajectoryId);
    const root = path.resolve(options.videoFolder);

    // sendFile releases the file handle on success, error and client abort alike
    res.sendFile(mediaPath, { root, dotfiles: 'deny' }, (err) => {
      if (err && !res.headersSent) {
        next(new NotFoundError('media', trajectoryId));
      }
    });
  }));

  return sessionRoutes;
};
