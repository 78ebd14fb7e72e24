// API layer: Game session routes
// One endpoint per player command; every response carries the outcome and the new view

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { SessionService } from '@/application/game/SessionService.js';

const CreateSessionSchema = z.object({
  contentId: z.string().min(1).optional(),
  seed: z.number().int().min(0).optional(),
  fixed: z.boolean().optional(),
  maxFloors: z.number().int().min(1).optional(),
  fromSave: z
    .object({
      sessionId: z.string().min(1),
      slotName: z.string().min(1).max(64),
    })
    .optional(),
});

const MoveSchema = z.object({
  direction: z.enum(['up', 'down', 'left', 'right']),
});

const AnswerSchema = z.object({
  answer: z.union([z.number().int(), z.string()]),
});

export function createSessionRouter(sessions: SessionService): Router {
  const router = Router();

  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const options = CreateSessionSchema.parse(req.body ?? {});
      const { sessionId, view } = await sessions.createSession(options);
      res.status(201).json({ success: true, sessionId, view });
    })
  );

  router.get(
    '/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      const view = await sessions.getView(req.params.sessionId);
      res.json({ success: true, view });
    })
  );

  router.post(
    '/:sessionId/move',
    asyncHandler(async (req: Request, res: Response) => {
      const { direction } = MoveSchema.parse(req.body);
      const result = await sessions.move(req.params.sessionId, direction);
      res.json({ success: true, ...result });
    })
  );

  router.post(
    '/:sessionId/interact',
    asyncHandler(async (req: Request, res: Response) => {
      const result = await sessions.interact(req.params.sessionId);
      res.json({ success: true, ...result });
    })
  );

  router.post(
    '/:sessionId/answer',
    asyncHandler(async (req: Request, res: Response) => {
      const { answer } = AnswerSchema.parse(req.body);
      const result = await sessions.answer(req.params.sessionId, answer);
      res.json({ success: true, ...result });
    })
  );

  router.post(
    '/:sessionId/exit',
    asyncHandler(async (req: Request, res: Response) => {
      const result = await sessions.exitConversation(req.params.sessionId);
      res.json({ success: true, ...result });
    })
  );

  // Quit
  router.delete(
    '/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      const { stats } = await sessions.quit(req.params.sessionId);
      res.json({ success: true, stats });
    })
  );

  return router;
}
