import { Request, Response, NextFunction } from 'express';
import { env } from '@/config/env';
import { defaultCredentials, marketSnapshotService } from '@/config/dependencies';
import { snapshotQuerySchema } from '@/validators/recommendation.validator';
import { ValidationError } from '@/errors';

/**
 * Snapshots Controller
 * Exposes the cached universe batch and the manual refresh action
 */

/**
 * GET /api/v1/snapshots?useLive=true|false
 * Current universe snapshots, using the configured credentials
 */
export async function getSnapshots(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const validationResult = snapshotQuerySchema.safeParse(req.query);

    if (!validationResult.success) {
      throw new ValidationError('Invalid query', validationResult.error.flatten());
    }

    const useLive = validationResult.data.useLive ?? env.USE_LIVE_DATA;
    const batch = await marketSnapshotService.getUniverseSnapshots(defaultCredentials, useLive);

    res.json({
      source: batch.source,
      fetchedAt: batch.fetchedAt.toISOString(),
      count: batch.snapshots.length,
      snapshots: batch.snapshots,
    });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/snapshots/refresh
 * Clear every cached batch; the next request fetches again
 */
export function refreshSnapshots(_req: Request, res: Response): void {
  const cleared = marketSnapshotService.refresh();
  res.json({ success: true, cleared });
}
