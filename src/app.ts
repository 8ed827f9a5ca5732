import cors from "cors";
import express from "express";
import { diffsRouter } from "./routes/diffs.js";
import { errorHandler } from "./utils/errorHandler.js";
import { jsonReplacer } from "./utils/values.js";

export function createApp() {
  const app = express();
  app.set("json replacer", jsonReplacer);
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", service: "export-diff" });
  });

  app.use("/api/v1/diffs", diffsRouter);

  app.use(errorHandler);
  return app;
}
