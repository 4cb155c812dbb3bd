/**
 * Activity catalog and sign-up.
 * GET /activities, POST /activities/:activityName/signup?email=
 */

import { Router, Request, Response } from 'express';
import { param, query } from 'express-validator';
import { validate } from '../middleware/validate';
import type { ActivityService } from '../../services/activity.service';

export function createActivityRoutes(activities: ActivityService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json(activities.list());
  });

  router.post(
    '/:activityName/signup',
    validate([param('activityName').isString(), query('email').isString().withMessage('email is required')]),
    (req: Request, res: Response) => {
      const { activityName } = req.params;
      const email = String(req.query.email);
      if (!activities.signup(activityName, email)) {
        res.status(404).json({ error: 'Activity not found' });
        return;
      }
      res.json({ message: `Signed up ${email} for ${activityName}` });
    }
  );

  return router;
}
