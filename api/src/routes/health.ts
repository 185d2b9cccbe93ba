import { Router, Request, Response } from 'express';
import { RosterService } from '../services/roster.service';

/**
 * @openapi
 * /health:
 *   get:
 *     tags:
 *       - System
 *     summary: Liveness probe
 *     responses:
 *       200:
 *         description: Service is running
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 status:
 *                   type: string
 *                   example: healthy
 *                 timestamp:
 *                   type: string
 *                 activities:
 *                   type: integer
 */
export function createHealthRouter(rosterService: RosterService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      activities: rosterService.size,
    });
  });

  return router;
}
