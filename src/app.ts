import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// Trust the first proxy hop so req.ip is the client address behind a load balancer
app.set('trust proxy', 1);

// Security headers
app.use(helmet());

// CORS - browser UIs call this API outside production; no credentials either way
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

// Body parsers with size limits
app.use(express.json({ limit: '10kb' }));

// HTTP metrics tracking (all requests except /health and /metrics)
app.use(metricsMiddleware);

// Global rate limiting (all routes except /health)
app.use(globalRateLimiter);

// Request logging (pino-http)
app.use(requestLogger);

// ============================================
// Routes
// ============================================

// Swagger API Documentation
try {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const openapiDocument = z.record(z.unknown()).parse(yaml.load(readFileSync(openapiPath, 'utf8')));
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

// API routes (mounted at /api)
app.use('/api', apiRoutes);

// Root endpoint
app.get('/', (_req, res) => {
  res.json({
    name: 'KOSPI Recommendation API',
    version: '1.0.0',
    description: 'Ranks tracked KOSPI 200 stocks by a configurable heuristic score',
    documentation: '/api-docs',
    endpoints: {
      health: '/api/health',
      metrics: '/api/metrics',
      recommendations: 'POST /api/v1/recommendations',
      rules: '/api/v1/rules',
      snapshots: '/api/v1/snapshots?useLive=false',
      refresh: 'POST /api/v1/snapshots/refresh',
    },
  });
});

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
