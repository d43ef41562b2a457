import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { createApiErrorResponse, ERROR_CODES } from "@shared/errors";
import { HTTP_STATUS } from "./config/constants";
import { errorHandler } from "./middleware/errorHandler";
import { registerHealthRoutes } from "./routes/health-routes";
import { createVpbRouter } from "./routes/vpb-routes";
import { logger } from "./services/logger";
import type { FinancialDataExtractor } from "./services/vpb-extraction";

export interface AppOptions {
  extractor: FinancialDataExtractor;
  corsOrigins: '*' | string[];
  extractionConfigured?: boolean;
}

function newRequestId(): string {
  return Date.now().toString(36) + Math.random().toString(36).slice(2);
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // CORS middleware
  app.use((req, res, next) => {
    const origin = req.headers.origin;

    if (options.corsOrigins === '*') {
      res.header('Access-Control-Allow-Origin', '*');
    } else if (origin && options.corsOrigins.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
      res.header('Vary', 'Origin');
    }

    res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization, X-Request-ID');

    if (req.method === 'OPTIONS') {
      return res.sendStatus(HTTP_STATUS.OK);
    }

    next();
  });

  app.use(express.json({ limit: '5mb' }));

  // Request ID middleware voor betere error tracking
  app.use((req, res, next) => {
    const requestId = req.header('x-request-id') || newRequestId();
    req.headers['x-request-id'] = requestId;
    res.header('X-Request-ID', requestId);
    next();
  });

  // Request logging middleware
  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    const requestLogger = logger.forRequest(req.header('x-request-id') || 'unknown');

    res.on("finish", () => {
      if (!path.startsWith("/api")) return;
      const duration = Date.now() - start;
      const status = res.statusCode < 400 ? '✅' : '❌';
      requestLogger.info(`${status} ${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    });

    next();
  });

  registerHealthRoutes(app, { extractionConfigured: options.extractionConfigured ?? true });
  app.use("/api", createVpbRouter({ extractor: options.extractor }));

  app.use("/api", (req: Request, res: Response, _next: NextFunction) => {
    res.status(HTTP_STATUS.NOT_FOUND).json(
      createApiErrorResponse(
        'SERVER_ERROR',
        ERROR_CODES.NOT_FOUND,
        `No route for ${req.method} ${req.originalUrl}`,
        'Deze endpoint bestaat niet.'
      )
    );
  });

  app.use(errorHandler);

  return app;
}
