import { randomUUID } from "crypto";
import { EvaluationMetricName } from "../../config/app.config";
import { ChunkingOptions, toChunks } from "../chunker/chunker";
import { errorMessage, JobStateError } from "../errors/errors";
import { evaluateAnalysis } from "../evaluation/evaluation.service";
import { runJudge } from "../evaluation/judge.service";
import { EvaluationMetrics } from "../evaluation/types";
import { DocumentExtractor, DocumentFile } from "../extractor/document.extractor";
import { AnalysisModelClient } from "../llm/analysis.client";
import { Logger, silentLogger } from "../logger/logger";
import { Retriever } from "../rag/retriever";
import { Analysis, ContextPassage, JudgeVerdict } from "../rag/types";
import { JobStore } from "./job.store";
import { Job } from "./types";

export interface JobOrchestratorDeps {
  store: JobStore;
  extractor: DocumentExtractor;
  retriever: Retriever;
  analysisClient: AnalysisModelClient;
  chunking: ChunkingOptions;
  topK: number;
  enabledMetrics: readonly EvaluationMetricName[];
  judgeEnabled: boolean;
  logger?: Logger;
  newId?: () => string;
  now?: () => Date;
}

interface PipelineResult {
  analysis: Analysis;
  metrics: EvaluationMetrics;
  judge?: JudgeVerdict;
}

/**
 * Runs analysis jobs in the background. Each job moves
 * pending -> processing -> completed | failed, and its stages run strictly
 * in order; separate jobs run concurrently and share nothing mutable.
 */
export class JobOrchestrator {
  private readonly logger: Logger;
  private readonly newId: () => string;
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, Promise<void | Job>>();

  constructor(private readonly deps: JobOrchestratorDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.newId = deps.newId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  /** Creates a pending job and starts it in the background. */
  async submit(file: DocumentFile): Promise<Job> {
    const job = await this.deps.store.create({
      id: this.newId(),
      status: "pending",
      fileName: file.fileName,
      createdAt: this.timestamp(),
    });
    this.logger.info(`Job ${job.id} created`, { fileName: file.fileName });

    const running = this.run(job.id, file)
      .catch((error: unknown) => {
        this.logger.error(`Job ${job.id} could not be recorded`, {
          error: errorMessage(error),
        });
      })
      .finally(() => {
        this.inFlight.delete(job.id);
      });
    this.inFlight.set(job.id, running);

    return job;
  }

  /**
   * Executes a pending job to a terminal state. Stage failures are recorded
   * on the job; only store failures reject.
   */
  async run(jobId: string, file: DocumentFile): Promise<Job> {
    const job = await this.deps.store.get(jobId);
    if (!job) {
      throw new JobStateError(`Job ${jobId} not found`);
    }

    await this.deps.store.update(jobId, {
      status: "processing",
      startedAt: this.timestamp(),
    });
    this.logger.info(`Job ${jobId} processing`);

    let result: PipelineResult;
    try {
      result = await this.execute(jobId, file);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Job ${jobId} failed: ${message}`);
      return this.deps.store.update(jobId, {
        status: "failed",
        error: message,
        completedAt: this.timestamp(),
      });
    }

    this.logger.info(`Job ${jobId} completed`, {
      totalRisks: result.analysis.metadata.totalRisks,
      overallScore: result.metrics.overallScore,
    });
    return this.deps.store.update(jobId, {
      status: "completed",
      analysis: result.analysis,
      metrics: result.metrics,
      ...(result.judge ? { judge: result.judge } : {}),
      completedAt: this.timestamp(),
    });
  }

  private async execute(jobId: string, file: DocumentFile): Promise<PipelineResult> {
    const log = this.logger.child(jobId);

    const extracted = await this.deps.extractor.extract(file);
    const documentText = this.deps.extractor.clean(extracted.rawText);
    const chunks = toChunks(documentText, extracted.title, this.deps.chunking);
    log.info(`Extracted ${documentText.length} characters`, {
      kind: extracted.kind,
      chunks: chunks.length,
    });

    const passages = await this.deps.retriever.retrieve(documentText, {
      topK: this.deps.topK,
    });

    const analysis = await this.deps.analysisClient.analyze(documentText, passages);
    log.info(`Analysis found ${analysis.metadata.totalRisks} risks`, {
      containsAi: analysis.containsAi,
    });

    const metrics = evaluateAnalysis(
      { passages, analysis, documentText, enabledMetrics: this.deps.enabledMetrics },
      log
    );

    const judge = await this.judgeSafely(log, documentText, analysis, passages);
    return { analysis, metrics, judge };
  }

  // The verdict is advisory: a failing judge leaves the job completed without one.
  private async judgeSafely(
    log: Logger,
    documentText: string,
    analysis: Analysis,
    passages: readonly ContextPassage[]
  ): Promise<JudgeVerdict | undefined> {
    try {
      return await runJudge(
        { enabled: this.deps.judgeEnabled, client: this.deps.analysisClient, logger: log },
        documentText,
        analysis,
        passages
      );
    } catch (error) {
      log.warn(`Judge evaluation failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  getJob(jobId: string): Promise<Job | undefined> {
    return this.deps.store.get(jobId);
  }

  listJobs(): Promise<Job[]> {
    return this.deps.store.list();
  }

  /** Resolves once any background run of the job has finished. */
  async whenSettled(jobId: string): Promise<Job | undefined> {
    await this.inFlight.get(jobId);
    return this.deps.store.get(jobId);
  }
}
