import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { DiffError } from "./errors.js";
import { logger } from "./logger.js";

export const errorHandler: ErrorRequestHandler = (error, _req, res, _next) => {
  if (error instanceof ZodError) {
    res.status(400).json({ message: "Validation failed", issues: error.issues });
    return;
  }

  if (error instanceof DiffError) {
    res.status(error.statusCode).json({ code: error.code, message: error.message });
    return;
  }

  logger.error(error);
  res.status(500).json({
    message: error instanceof Error ? error.message : "Internal server error"
  });
};
