import os from "os";
import path from "path";
import dotenv from "dotenv";

dotenv.config();

function numberFromEnv(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export const env = {
  port: numberFromEnv(process.env.PORT, 4000),
  tolerance: numberFromEnv(process.env.DIFF_TOLERANCE, 1e-10),
  displayRowLimit: numberFromEnv(process.env.DISPLAY_ROW_LIMIT, 10),
  uploadDir: process.env.UPLOAD_DIR?.trim() || path.join(os.tmpdir(), "export-diff-uploads"),
  logLevel: (process.env.LOG_LEVEL ?? "warn").trim().toLowerCase()
};
