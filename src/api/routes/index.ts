import { Router } from 'express';
import recommendationsRoutes from './recommendations.routes';
import snapshotsRoutes from './snapshots.routes';
import { listRules } from '@/controllers/recommendations.controller';
import { getMetrics } from '@/api/controllers/metrics.controller';

export const SERVICE_NAME = 'kospi-recommendation-api';

const router = Router();

/**
 * API Routes
 * Base path: /api
 *
 * Versioning Strategy: /api/v1/*
 * - Health and metrics endpoints stay unversioned (infrastructure, not API)
 */

// Health check endpoint (unversioned - infrastructure endpoint)
router.get('/health', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: SERVICE_NAME,
    version: 'v1',
  });
});

// Metrics endpoint (Prometheus text format)
router.get('/metrics', getMetrics);

// v1 API routes
const v1Router = Router();

v1Router.use('/recommendations', recommendationsRoutes);
v1Router.use('/snapshots', snapshotsRoutes);
v1Router.get('/rules', listRules);

router.use('/v1', v1Router);

export default router;
