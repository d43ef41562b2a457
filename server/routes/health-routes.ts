/**
 * Health Check Routes
 */

import type { Express, Request, Response } from "express";
import { createApiSuccessResponse } from "@shared/errors";
import { HTTP_STATUS } from "../config/constants";

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  extractionConfigured: boolean;
}

export function registerHealthRoutes(app: Express, options: { extractionConfigured: boolean }): void {
  /**
   * GET /api/health
   *
   * Snelle check voor load balancers; doet geen AI calls.
   */
  app.get("/api/health", (_req: Request, res: Response) => {
    const health: HealthStatus = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      extractionConfigured: options.extractionConfigured,
    };
    res.status(HTTP_STATUS.OK).json(createApiSuccessResponse(health, 'Service is running'));
  });
}
