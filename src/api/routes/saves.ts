// API layer: Save/load routes
// Exposes endpoints for game state persistence

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';
import type { SessionService } from '@/application/game/SessionService.js';

const SLOT_NAME = z
  .string()
  .trim()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/, 'Slot names may only contain letters, digits, "-" and "_"');

const SaveSchema = z.object({
  slotName: SLOT_NAME.optional(),
});

const LoadSchema = z.object({
  slotName: SLOT_NAME,
});

export function createSaveRouter(sessions: SessionService): Router {
  const router = Router();

  router.get(
    '/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      const slots = await sessions.listSaves(req.params.sessionId);
      res.json({ success: true, slots });
    })
  );

  router.post(
    '/:sessionId/save',
    asyncHandler(async (req: Request, res: Response) => {
      const { slotName } = SaveSchema.parse(req.body ?? {});
      const save = await sessions.save(req.params.sessionId, slotName);
      res.json({ success: true, save });
    })
  );

  router.post(
    '/:sessionId/load',
    asyncHandler(async (req: Request, res: Response) => {
      const { slotName } = LoadSchema.parse(req.body);
      const result = await sessions.load(req.params.sessionId, slotName);

      res.json({
        success: true,
        load: {
          slotName: result.slotName,
          loadedAt: new Date(result.loadedAt).toISOString(),
        },
        view: result.view,
      });
    })
  );

  router.delete(
    '/:sessionId/:slotName',
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId, slotName } = req.params;
      const deleted = await sessions.deleteSave(sessionId, slotName);
      if (!deleted) {
        throw createError('Save slot not found', 404, 'SAVE_SLOT_NOT_FOUND', { sessionId, slotName });
      }

      res.json({ success: true, deleted: { sessionId, slotName } });
    })
  );

  return router;
}
