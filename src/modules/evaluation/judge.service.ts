import { AnalysisModelClient } from "../llm/analysis.client";
import { Logger, silentLogger } from "../logger/logger";
import { Analysis, ContextPassage, JudgeVerdict } from "../rag/types";

export interface JudgeOptions {
  enabled: boolean;
  client: AnalysisModelClient;
  logger?: Logger;
}

/**
 * Asks the model to grade its own analysis. Resolves to undefined when
 * judging is disabled; errors from the client propagate to the caller.
 */
export async function runJudge(
  options: JudgeOptions,
  documentText: string,
  analysis: Analysis,
  passages: readonly ContextPassage[]
): Promise<JudgeVerdict | undefined> {
  if (!options.enabled) return undefined;

  const logger = options.logger ?? silentLogger;
  logger.info("Running judge evaluation...");

  const verdict = await options.client.judge(documentText, analysis, passages);
  logger.info(`Judge score: ${verdict.overall.toFixed(2)}`);
  return verdict;
}
