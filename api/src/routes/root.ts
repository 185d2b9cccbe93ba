import { Router, Request, Response } from 'express';

export const rootRouter = Router();

/**
 * @openapi
 * /:
 *   get:
 *     tags:
 *       - System
 *     summary: Redirect to the static front page
 *     responses:
 *       307:
 *         description: Redirect to /static/index.html
 */
rootRouter.get('/', (_req: Request, res: Response) => {
  res.redirect(307, '/static/index.html');
});
