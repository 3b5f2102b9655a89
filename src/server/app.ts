import path from "path";
import express, { Application, Request, Response } from "express";
import { Container } from "../container";
import { AppError, errorMessage, ErrorCode } from "../modules/errors/errors";

export const APP_VERSION = "1.0.0";

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  EXTRACTION_ERROR: 422,
  JOB_STATE_ERROR: 409,
  EMBEDDING_ERROR: 502,
  MODEL_CALL_ERROR: 502,
  PARSE_ERROR: 502,
  INDEX_ERROR: 503,
};

function statusFor(error: unknown): number {
  return error instanceof AppError ? STATUS_BY_CODE[error.code] : 500;
}

function extensionOf(fileName: string): string {
  return path.extname(fileName).toLowerCase().replace(".", "");
}

// Base64 inflates by 4/3; leave room for the rest of the JSON body.
function bodyLimit(maxFileSizeMb: number): string {
  return `${Math.ceil(maxFileSizeMb * (4 / 3)) + 1}mb`;
}

export function createApp(container: Container): Application {
  const { config, corpusIndexer, orchestrator } = container;
  const logger = container.logger.child("http");
  const app: Application = express();

  app.use(express.json({ limit: bodyLimit(config.upload.maxFileSizeMb) }));

  app.get("/health", async (_req: Request, res: Response) => {
    try {
      const stats = await corpusIndexer.getCollectionStats();
      res.json({
        status: "healthy",
        version: APP_VERSION,
        vectorDbStatus: stats.indexed ? "ready" : "not_indexed",
        llmStatus: "ready",
      });
    } catch (error) {
      logger.warn(`Vector index unavailable: ${errorMessage(error)}`);
      res.json({
        status: "degraded",
        version: APP_VERSION,
        vectorDbStatus: "unavailable",
        llmStatus: "ready",
      });
    }
  });

  app.post("/api/upload", async (req: Request, res: Response) => {
    const fileName: unknown = req.body?.fileName;
    const contentBase64: unknown = req.body?.contentBase64;

    if (typeof fileName !== "string" || !fileName.trim()) {
      return res
        .status(400)
        .json({ error: "Field 'fileName' is required and must be a string." });
    }
    if (typeof contentBase64 !== "string" || !contentBase64.trim()) {
      return res
        .status(400)
        .json({ error: "Field 'contentBase64' is required and must be a string." });
    }

    const extension = extensionOf(fileName);
    if (!config.upload.allowedExtensions.includes(extension)) {
      return res.status(400).json({
        error: `Invalid file type. Allowed: ${config.upload.allowedExtensions.join(", ")}`,
      });
    }

    const bytes = Buffer.from(contentBase64, "base64");
    if (bytes.length > config.upload.maxFileSizeMb * 1024 * 1024) {
      return res.status(400).json({
        error: `File too large. Max size: ${config.upload.maxFileSizeMb}MB`,
      });
    }

    try {
      const job = await orchestrator.submit({ fileName, bytes });
      logger.info(`File uploaded: ${fileName} (job ${job.id})`);
      res.status(202).json({
        jobId: job.id,
        status: job.status,
        message: "File uploaded successfully. Analysis started.",
      });
    } catch (error) {
      logger.error("Error while creating job", { error });
      res.status(statusFor(error)).json({ error: errorMessage(error) });
    }
  });

  app.get("/api/analyze/:jobId", async (req: Request, res: Response) => {
    try {
      const job = await orchestrator.getJob(req.params.jobId);
      if (!job) {
        return res.status(404).json({ error: "Job not found" });
      }
      res.json(job);
    } catch (error) {
      logger.error("Failed to read job", { error });
      res.status(statusFor(error)).json({ error: errorMessage(error) });
    }
  });

  app.get("/api/jobs", async (_req: Request, res: Response) => {
    try {
      res.json({ jobs: await orchestrator.listJobs() });
    } catch (error) {
      logger.error("Failed to list jobs", { error });
      res.status(statusFor(error)).json({ error: errorMessage(error) });
    }
  });

  app.post("/api/index-corpus", async (req: Request, res: Response) => {
    const force = req.query.force === "true" || req.query.force === "1";

    try {
      const result = await corpusIndexer.indexReferenceCorpus({ force });
      res.json({
        status: "success",
        message: result.reindexed
          ? `Indexed ${result.chunks} chunks from the reference corpus`
          : `Reference corpus already indexed (${result.chunks} chunks)`,
        chunks: result.chunks,
      });
    } catch (error) {
      logger.error("Indexing failed", { error });
      res.status(500).json({ status: "error", error: errorMessage(error) });
    }
  });

  app.get("/api/vector-stats", async (_req: Request, res: Response) => {
    try {
      res.json(await corpusIndexer.getCollectionStats());
    } catch (error) {
      logger.error("Failed to read collection stats", { error });
      res.status(statusFor(error)).json({ error: errorMessage(error) });
    }
  });

  return app;
}
