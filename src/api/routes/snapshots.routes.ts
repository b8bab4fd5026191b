import { Router } from 'express';
import * as snapshotsController from '@/controllers/snapshots.controller';
import { refreshRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

router.get('/', snapshotsController.getSnapshots);

/**
 * POST /api/v1/snapshots/refresh
 * The cache is shared by all clients, hence the strict limiter
 */
router.post('/refresh', refreshRateLimiter, snapshotsController.refreshSnapshots);

export default router;
