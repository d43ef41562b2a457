/**
 * VPB Routes
 *
 * POST /api/process-document  upload → tekst → AI extractie → berekening
 * POST /api/compute           AI-extractie-vormige JSON → berekening
 */

import { Router, type Request, type Response } from "express";
import multer from "multer";
import { z } from "zod";
import { createApiSuccessResponse } from "@shared/errors";
import { FILE_UPLOAD } from "../config/constants";
import { asyncHandler, ServerError } from "../middleware/errorHandler";
import { extractDocumentText } from "../services/document-text-extractor";
import type { FinancialDataExtractor } from "../services/vpb-extraction";
import { processFinancialDocument } from "../services/vpb-report";
import { logger } from "../services/logger";

export interface VpbRouterDependencies {
  extractor: FinancialDataExtractor;
}

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: FILE_UPLOAD.MAX_SIZE_BYTES, files: 1 },
});

// Velden worden pas bij de berekening tolerant ingelezen; hier alleen de vorm
const computeRequestSchema = z.record(z.unknown());

function computeAndRespond(res: Response, rawExtraction: unknown) {
  const result = processFinancialDocument(rawExtraction);
  if (!result.success) {
    throw ServerError.fromComputation(result.error);
  }
  res.json(createApiSuccessResponse(result.data));
}

export function createVpbRouter({ extractor }: VpbRouterDependencies): Router {
  const router = Router();

  router.post(
    "/process-document",
    upload.single(FILE_UPLOAD.FIELD_NAME),
    asyncHandler(async (req: Request, res: Response) => {
      const file = req.file;
      if (!file) {
        throw ServerError.validation(
          `Missing multipart field "${FILE_UPLOAD.FIELD_NAME}"`,
          'Er is geen bestand meegestuurd.'
        );
      }

      const document = await extractDocumentText(file.buffer, file.originalname);
      const rawExtraction = await extractor.extract(document.text, document.tables);
      logger.info('vpb-routes', `🧮 Computing VPB for ${file.originalname}`, { kind: document.kind });

      computeAndRespond(res, rawExtraction);
    })
  );

  router.post(
    "/compute",
    asyncHandler(async (req: Request, res: Response) => {
      const body = computeRequestSchema.parse(req.body);
      computeAndRespond(res, body);
    })
  );

  return router;
}
