import { Router, Request, Response, NextFunction } from 'express';
import * as ctrl from '../controllers/chart.controller';

// ═══════════════════════════════════════════════════════════
// Chart Routes (all READ-ONLY)
// ═══════════════════════════════════════════════════════════

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error handler
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

const router = Router();

router.get('/', asyncRoute(ctrl.chartPage));
router.get('/api/followers', asyncRoute(ctrl.followersApi));
router.get('/export/followers.csv', asyncRoute(ctrl.exportFollowersCsv));
router.get('/health', ctrl.health);

export default router;
