import fs from "fs";
import type { Request } from "express";
import { Router } from "express";
import multer from "multer";
import { z } from "zod";
import { env } from "../config/env.js";
import { buildDiffReport } from "../services/diffReport.js";
import { runDiffPipeline } from "../services/diffPipeline.js";
import { logger } from "../utils/logger.js";

fs.mkdirSync(env.uploadDir, { recursive: true });
const upload = multer({ dest: env.uploadDir });

export const diffFormSchema = z.object({
  tolerance: z.coerce.number().positive().optional(),
  rowLimit: z.coerce.number().int().min(0).optional()
});

type UploadedPair = {
  baseline?: Express.Multer.File;
  comparison?: Express.Multer.File;
};

function collectUploads(files: Request["files"]): UploadedPair {
  if (!files || Array.isArray(files)) return {};
  return { baseline: files.baseline?.[0], comparison: files.comparison?.[0] };
}

async function removeUploads(uploads: UploadedPair) {
  for (const file of [uploads.baseline, uploads.comparison]) {
    if (!file) continue;
    try {
      await fs.promises.rm(file.path, { force: true });
    } catch (error) {
      logger.warn(`Could not remove upload ${file.path}`, error);
    }
  }
}

export const diffsRouter = Router();

diffsRouter.post(
  "/",
  upload.fields([
    { name: "baseline", maxCount: 1 },
    { name: "comparison", maxCount: 1 }
  ]),
  async (req, res, next) => {
    const uploads = collectUploads(req.files);
    try {
      if (!uploads.baseline || !uploads.comparison) {
        res.status(400).json({ message: "Missing baseline or comparison file" });
        return;
      }
      const form = diffFormSchema.parse(req.body ?? {});
      const result = runDiffPipeline(uploads.baseline.path, uploads.comparison.path, {
        tolerance: form.tolerance
      });
      if (!result.ok) throw result.error;

      const report = buildDiffReport(result.value, { rowLimit: form.rowLimit });
      res.json({ summary: report.summary, report, result: result.value });
    } catch (error) {
      next(error);
    } finally {
      await removeUploads(uploads);
    }
  }
);
