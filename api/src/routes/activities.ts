import { Router, Request, Response, NextFunction } from 'express';
import { RosterService, RosterErrorCode, RosterResult } from '../services/roster.service';
import { AppError, createError, ErrorCode, ErrorFactory, normalizeError } from '../utils/errors';

const ROSTER_ERROR_TO_CODE: Record<RosterErrorCode, ErrorCode> = {
  NOT_FOUND: ErrorCode.NOT_FOUND,
  ALREADY_SIGNED_UP: ErrorCode.ALREADY_SIGNED_UP,
  NOT_REGISTERED: ErrorCode.NOT_REGISTERED,
};

function toAppError(
  result: Extract<RosterResult, { ok: false }>,
  activityName: string,
  email: string
): AppError {
  return createError(ROSTER_ERROR_TO_CODE[result.error], result.message, { activity: activityName, email });
}

/**
 * 读取 ?email=，不校验邮箱格式
 */
function requireEmail(req: Request): string {
  const { email } = req.query;
  if (email === undefined) {
    throw ErrorFactory.missingParameter('email');
  }
  if (typeof email !== 'string') {
    throw ErrorFactory.invalidRequest('email must be a single value', { parameter: 'email' });
  }
  return email;
}

/**
 * @openapi
 * components:
 *   schemas:
 *     Activity:
 *       type: object
 *       properties:
 *         description:
 *           type: string
 *         schedule:
 *           type: string
 *         max_participants:
 *           type: integer
 *         participants:
 *           type: array
 *           items:
 *             type: string
 *     Message:
 *       type: object
 *       properties:
 *         message:
 *           type: string
 *     ErrorDetail:
 *       type: object
 *       properties:
 *         detail:
 *           type: string
 */
export function createActivitiesRouter(rosterService: RosterService): Router {
  const router = Router();

  /**
   * @openapi
   * /activities:
   *   get:
   *     tags:
   *       - Activities
   *     summary: List all activities
   *     responses:
   *       200:
   *         description: Activity name mapped to its details
   *         content:
   *           application/json:
   *             schema:
   *               type: object
   *               additionalProperties:
   *                 $ref: '#/components/schemas/Activity'
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json(rosterService.listActivities());
  });

  /**
   * @openapi
   * /activities/{activityName}/signup:
   *   post:
   *     tags:
   *       - Activities
   *     summary: Sign up a student for an activity
   *     parameters:
   *       - in: path
   *         name: activityName
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: email
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Signed up
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Message'
   *       400:
   *         description: Already signed up, or email missing
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ErrorDetail'
   *       404:
   *         description: Activity not found
   */
  router.post('/:activityName/signup', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { activityName } = req.params;
      const email = requireEmail(req);

      const result = rosterService.signup(activityName, email);
      if (!result.ok) {
        return next(toAppError(result, activityName, email));
      }

      res.json({ message: result.message });
    } catch (error) {
      return next(normalizeError(error));
    }
  });

  /**
   * @openapi
   * /activities/{activityName}/unregister:
   *   delete:
   *     tags:
   *       - Activities
   *     summary: Unregister a student from an activity
   *     parameters:
   *       - in: path
   *         name: activityName
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: email
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Unregistered
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Message'
   *       400:
   *         description: Not registered, or email missing
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/ErrorDetail'
   *       404:
   *         description: Activity not found
   */
  router.delete('/:activityName/unregister', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { activityName } = req.params;
      const email = requireEmail(req);

      const result = rosterService.unregister(activityName, email);
      if (!result.ok) {
        return next(toAppError(result, activityName, email));
      }

      res.json({ message: result.message });
    } catch (error) {
      return next(normalizeError(error));
    }
  });

  return router;
}
