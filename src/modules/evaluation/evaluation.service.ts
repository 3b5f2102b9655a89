import { EvaluationMetricName } from "../../config/app.config";
import { Logger, silentLogger } from "../logger/logger";
import { Analysis, ContextPassage, Risk } from "../rag/types";
import { EvaluationInput, EvaluationMetrics } from "./types";

/*
 * Lexical heuristics only: term overlap and substring checks, no embeddings
 * and no model calls. They trade precision for being free and deterministic.
 */

const MIN_TERM_LENGTH = 5;
const MIN_GROUNDED_TERMS = 2;
const RELEVANCE_BOOST = 1.2;

// Substring checks, so "ai" also matches inside longer words.
const AI_INDICATORS: readonly string[] = [
  "ai",
  "machine learning",
  "neural",
  "model",
  "algorithm",
];

function allRisks(analysis: Analysis): Risk[] {
  return [...analysis.highRisks, ...analysis.lowRisks];
}

function joinContext(passages: readonly ContextPassage[]): string {
  return passages.map((passage) => passage.text).join(" ").toLowerCase();
}

function words(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/** Distinct description terms longer than four characters found in the context. */
function groundedTermCount(description: string, contextText: string): number {
  const terms = new Set(words(description).filter((term) => term.length >= MIN_TERM_LENGTH));
  let count = 0;
  for (const term of terms) {
    if (contextText.includes(term)) count++;
  }
  return count;
}

function isGrounded(risk: Risk, contextText: string): boolean {
  return groundedTermCount(risk.description, contextText) >= MIN_GROUNDED_TERMS;
}

export function calculateFaithfulness(
  passages: readonly ContextPassage[],
  analysis: Analysis
): number {
  const risks = allRisks(analysis);
  if (risks.length === 0) return 1;

  const contextText = joinContext(passages);
  const grounded = risks.filter((risk) => isGrounded(risk, contextText)).length;
  return grounded / risks.length;
}

export function calculateAnswerRelevance(analysis: Analysis, documentText: string): number {
  const descriptionWords = new Set(words(analysis.description));
  if (descriptionWords.size === 0) return 0;

  const documentLower = documentText.toLowerCase();
  const documentWords = new Set(words(documentLower));

  let common = 0;
  for (const word of descriptionWords) {
    if (documentWords.has(word)) common++;
  }

  let ratio = common / descriptionWords.size;
  const hasAiTerms = AI_INDICATORS.some((term) => documentLower.includes(term));
  if (hasAiTerms === analysis.containsAi) {
    ratio *= RELEVANCE_BOOST;
  }
  return Math.min(1, ratio);
}

export function calculateContextPrecision(
  passages: readonly ContextPassage[],
  analysis: Analysis
): number {
  if (passages.length === 0) return 0;

  const references = allRisks(analysis)
    .map((risk) => risk.euReference?.toLowerCase())
    .filter((reference): reference is string => Boolean(reference));

  const relevant = passages.filter((passage) => {
    const text = passage.text.toLowerCase();
    return references.some((reference) => text.includes(reference));
  }).length;

  return relevant / passages.length;
}

export function calculateContextRecall(
  passages: readonly ContextPassage[],
  analysis: Analysis
): number {
  const risks = allRisks(analysis);
  if (risks.length === 0) return 1;

  const contextText = joinContext(passages);
  const supported = risks.filter(
    (risk) => Boolean(risk.euReference) || isGrounded(risk, contextText)
  ).length;
  return supported / risks.length;
}

type MetricKey = Exclude<keyof EvaluationMetrics, "overallScore">;

const METRIC_KEYS: Record<EvaluationMetricName, MetricKey> = {
  faithfulness: "faithfulness",
  answer_relevance: "answerRelevance",
  context_precision: "contextPrecision",
  context_recall: "contextRecall",
};

function scoreMetric(name: EvaluationMetricName, input: EvaluationInput): number {
  switch (name) {
    case "faithfulness":
      return calculateFaithfulness(input.passages, input.analysis);
    case "answer_relevance":
      return calculateAnswerRelevance(input.analysis, input.documentText);
    case "context_precision":
      return calculateContextPrecision(input.passages, input.analysis);
    case "context_recall":
      return calculateContextRecall(input.passages, input.analysis);
  }
}

/**
 * Computes every enabled metric; `overallScore` is their mean, 0 when none
 * are enabled.
 */
export function evaluateAnalysis(
  input: EvaluationInput,
  logger: Logger = silentLogger
): EvaluationMetrics {
  const metrics: EvaluationMetrics = { overallScore: 0 };
  const scores: number[] = [];

  for (const name of new Set(input.enabledMetrics)) {
    const score = scoreMetric(name, input);
    metrics[METRIC_KEYS[name]] = score;
    scores.push(score);
  }

  if (scores.length > 0) {
    metrics.overallScore = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  }

  logger.info("Evaluation metrics", { ...metrics });
  return metrics;
}
