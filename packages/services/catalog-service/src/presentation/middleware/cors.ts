import cors from 'cors';

/**
 * Permissive CORS: any origin may browse, upload and stream. Preflight requests are
 * answered with 204 before reaching the routes.
 */
export function catalogCors() {
  return cors({
    origin: '*',
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Range'],
    exposedHeaders: ['Content-Range', 'Content-Length', 'Accept-Ranges', 'X-Correlation-Id'],
    optionsSuccessStatus: 204,
  });
}
