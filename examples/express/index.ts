import express from 'express';
import { z } from 'zod';
import { blockBlacklisted } from '../../src/lib/blacklist';
import { loadEnvConfig } from '../../src/lib/config';
import { errorHandler } from '../../src/lib/errors';
import { createGuard } from '../../src/lib/guard';
import { invalidateCache } from '../../src/lib/invalidate';
import { keyByHeader } from '../../src/lib/keys';
import { createLogger, errorMessage } from '../../src/lib/logger';
import { rateLimit } from '../../src/lib/rateLimit';

const phoneBody = z.object({ phone: z.string().regex(/^\+?\d{8,15}$/) });
const verifyBody = phoneBody.extend({ code: z.string().regex(/^\d{4,8}$/) });
const blacklistBody = z.object({
  ip: z.string().min(1),
  reason: z.string().min(1),
  durationSeconds: z.number().int().positive().optional(),
});

async function main() {
  const config = loadEnvConfig();
  const logger = createLogger({ scope: 'storefront', level: config.logLevel });
  const guard = await createGuard(config, {
    logger,
    memoizerHooks: {
      onHit: ({ key }) => logger.debug('Cache hit', { key }),
      onMiss: ({ key }) => logger.debug('Cache miss', { key }),
    },
  });
  const { memoizer, otp, blacklist } = guard;

  const salesReport = memoizer.cached(
    async (from: string, to: string) => {
      // Demo: stands in for an aggregation over the orders table
      return { from, to, total: Math.round(Math.random() * 10_000), generatedAt: new Date().toISOString() };
    },
    { prefix: 'analytics:sales', ttl: 3600 },
  );

  const app = express();
  app.use(express.json());
  app.use(blockBlacklisted({ blacklist, securityHeaders: true }));
  app.use(
    rateLimit({
      limiter: guard.rateLimiter,
      enabled: config.rateLimit.enabled,
      keyGenerator: keyByHeader('x-api-key'),
      hooks: {
        onBlocked: ({ key, totalHits }) => logger.warn('Rate limit exceeded', { key, totalHits }),
        onError: ({ error }) => logger.error('Rate limit error', { error: errorMessage(error) }),
      },
    }),
  );

  app.post('/api/v1/auth/otp/send', async (req, res, next) => {
    try {
      const { phone } = phoneBody.parse(req.body);
      if (await otp.isBlocked(phone)) {
        res.status(429).json({ error: 'Too many failed attempts. Please try again later.' });
        return;
      }
      const { code, expiresInSeconds } = await otp.issue(phone);
      // Demo: an SMS gateway would deliver the code instead
      logger.info('OTP generated', { phone, code });
      res.json({ sent: true, expiresInSeconds });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/v1/auth/otp/verify', async (req, res, next) => {
    try {
      const { phone, code } = verifyBody.parse(req.body);
      if (await otp.isBlocked(phone)) {
        res.status(429).json({ error: 'Too many failed attempts. Please try again later.' });
        return;
      }
      await otp.verifyOrThrow(phone, code);
      res.json({ verified: true });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/analytics/sales', async (req, res, next) => {
    try {
      const from = String(req.query.from ?? '2024-01-01');
      const to = String(req.query.to ?? '2024-12-31');
      res.json(await salesReport(from, to));
    } catch (error) {
      next(error);
    }
  });

  app.post(
    '/api/v1/orders',
    invalidateCache({
      memoizer,
      patterns: ['analytics:*'],
      hooks: {
        onInvalidated: ({ patterns, deleted }) => logger.info('Cache invalidated', { patterns, deleted }),
        onError: ({ error }) => logger.error('Cache invalidation error', { error: errorMessage(error) }),
      },
    }),
    (_req, res) => {
      res.status(201).json({ created: true });
    },
  );

  app.post('/admin/blacklist', async (req, res, next) => {
    try {
      const { ip, reason, durationSeconds } = blacklistBody.parse(req.body);
      res.status(201).json(await blacklist.add(ip, reason, durationSeconds));
    } catch (error) {
      next(error);
    }
  });

  app.delete('/admin/blacklist/:ip', async (req, res, next) => {
    try {
      res.json({ removed: await blacklist.remove(req.params.ip) });
    } catch (error) {
      next(error);
    }
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', cache: guard.store.kind });
  });

  app.use(errorHandler());
  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (error instanceof z.ZodError) {
      res.status(400).json({ error: 'Invalid request', issues: error.issues });
      return;
    }
    logger.error('Unhandled error', { error: errorMessage(error) });
    res.status(500).json({ error: 'Internal Server Error' });
  });

  const port = Number(process.env.PORT || 3000);
  const server = app.listen(port, () => {
    logger.info('Example app listening', { url: `http://localhost:${port}`, cache: guard.store.kind });
  });

  process.on('SIGTERM', () => {
    server.close(() => {
      guard.close().catch((error: unknown) => logger.error('Failed to close cache store', { error: errorMessage(error) }));
    });
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
