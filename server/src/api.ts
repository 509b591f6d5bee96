import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';
import { rateLimit, type RateLimitOptions } from './lib/rate-limit';
import { getAllowedUploadExtensions, saveUploadedFile } from './lib/upload-storage';
import { JobNotReadyError, JobServiceError, toErrorMessage } from './lib/jobs/errors';
import { isFileCategory } from './lib/jobs/file-type';
import type { JobService } from './lib/jobs/job-service';
import { isOutputFormat, type FileCategory } from './lib/jobs/types';

function errorResponse(c: Context, error: unknown, action: string) {
  if (error instanceof JobNotReadyError) {
    return c.json(
      {
        status: error.status,
        progress: error.progress,
        message: error.message,
      },
      202
    );
  }

  if (error instanceof JobServiceError) {
    return c.json({ error: error.message, code: error.code }, error.httpStatus);
  }

  console.error(`${action} error:`, error);
  return c.json(
    {
      error: `Failed to ${action}`,
      details: toErrorMessage(error),
    },
    500
  );
}

export type AppOptions = {
  rateLimit?: RateLimitOptions;
};

export function createApp(jobService: JobService, options: AppOptions = {}) {
  const app = new Hono();

  app.use('*', logger());
  app.use('*', cors());
  app.use(
    '*',
    secureHeaders({
      xFrameOptions: 'DENY',
      strictTransportSecurity: 'max-age=31536000; includeSubDomains',
      contentSecurityPolicy: { defaultSrc: ["'self'"] },
    })
  );
  app.use('*', rateLimit(options.rateLimit));

  // Health check routes - public
  app.get('/', (c) => c.json({ status: 'ok', message: 'API is running' }));
  app.get('/api/health', (c) => c.json({ status: 'ok', message: 'Service is healthy' }));

  const api = new Hono();

  async function handleProcess(c: Context, forcedCategory?: FileCategory) {
    try {
      const formData = await c.req.formData();
      const entry = formData.get('file');
      if (entry === null || typeof entry === 'string') {
        return c.json(
          {
            error: 'No file was provided. Use the "file" multipart field.',
            allowedExtensions: getAllowedUploadExtensions(forcedCategory),
          },
          400
        );
      }

      const rawFormat = formData.get('outputFormat');
      const outputFormat = rawFormat === null ? 'json' : rawFormat;
      if (!isOutputFormat(outputFormat)) {
        return c.json({ error: 'outputFormat must be "json" or "files"' }, 400);
      }

      const upload = await saveUploadedFile(entry, forcedCategory);
      const job = await jobService.create(upload.originalName, upload.category);
      jobService.schedule(job, upload.storedPath, { outputFormat });

      return c.json(job, 202);
    } catch (error) {
      return errorResponse(c, error, 'process uploaded file');
    }
  }

  api.post('/process', (c) => handleProcess(c));

  api.post('/process/:category', (c) => {
    const category = c.req.param('category');
    if (!isFileCategory(category)) {
      return c.json({ error: `Unknown category "${category}"` }, 400);
    }
    return handleProcess(c, category);
  });

  api.post('/jobs/cleanup', async (c) => {
    try {
      const removed = await jobService.cleanup();
      return c.json({ status: 'success', message: `Cleaned up ${removed} old jobs`, removed });
    } catch (error) {
      return errorResponse(c, error, 'clean up jobs');
    }
  });

  api.post('/jobs', async (c) => {
    try {
      const body: unknown = await c.req.json().catch(() => null);
      if (typeof body !== 'object' || body === null || !('fileName' in body) || typeof body.fileName !== 'string') {
        return c.json({ error: 'fileName is required' }, 400);
      }

      const fileName = body.fileName;
      const rawCategory = 'category' in body ? body.category : undefined;
      let category: FileCategory | 'auto' = 'auto';
      if (isFileCategory(rawCategory)) {
        category = rawCategory;
      } else if (rawCategory !== undefined && rawCategory !== 'auto') {
        return c.json({ error: `Unknown category "${String(rawCategory)}"` }, 400);
      }

      const job = await jobService.create(fileName, category);
      return c.json(job, 201);
    } catch (error) {
      return errorResponse(c, error, 'create job');
    }
  });

  api.get('/jobs/:jobId', async (c) => {
    try {
      return c.json(await jobService.status(c.req.param('jobId')));
    } catch (error) {
      return errorResponse(c, error, 'get job status');
    }
  });

  api.get('/jobs/:jobId/result', async (c) => {
    try {
      return c.json(await jobService.result(c.req.param('jobId')));
    } catch (error) {
      return errorResponse(c, error, 'get job result');
    }
  });

  api.delete('/jobs/:jobId', async (c) => {
    try {
      const jobId = c.req.param('jobId');
      await jobService.delete(jobId);
      return c.json({ status: 'success', message: `Job ${jobId} deleted` });
    } catch (error) {
      return errorResponse(c, error, 'delete job');
    }
  });

  app.route('/api/v1', api);

  return app;
}
