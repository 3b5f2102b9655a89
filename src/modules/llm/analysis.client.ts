import { Logger, silentLogger } from "../logger/logger";
import { buildContextBlock } from "../rag/retriever";
import { Analysis, ContextPassage, JudgeVerdict } from "../rag/types";
import { CompletionClient } from "./ollama.service";
import {
  decodeAnalysis,
  decodeJudgeVerdict,
  encodeAnalysis,
  parseModelJson,
} from "./response.decoder";

export interface AnalysisModelClient {
  analyze(documentText: string, passages: readonly ContextPassage[]): Promise<Analysis>;
  judge(
    documentText: string,
    analysis: Analysis,
    passages: readonly ContextPassage[]
  ): Promise<JudgeVerdict>;
}

export interface AnalysisClientOptions {
  model: string;
  judgeModel?: string;
  logger?: Logger;
}

const ANALYSIS_DOCUMENT_CHARS = 8000;
const JUDGE_DOCUMENT_CHARS = 4000;
const JUDGE_CONTEXT_PASSAGES = 3;

export function buildAnalysisPrompt(
  documentText: string,
  passages: readonly ContextPassage[]
): string {
  return `You are an AI compliance expert analyzing technical documents against the EU AI Act.

EU AI Act context:
${buildContextBlock(passages)}

Technical document to analyze:
${documentText.slice(0, ANALYSIS_DOCUMENT_CHARS)}

Task:
Analyze the technical document and return a JSON object with:
- project_name: the project name, extracted or inferred
- description: a 2-3 sentence description of the project
- contains_ai: true if the project contains AI/ML components
- ai_confidence: confidence of the AI detection (0.0-1.0)
- high_risks: high-risk items under the EU AI Act
- low_risks: low-risk items under the EU AI Act

Each risk has:
- description: what the risk is
- category: EU AI Act category (e.g. "Prohibited AI", "High-Risk AI")
- eu_act_reference: relevant article or section (e.g. "Article 6")
- confidence_score: confidence in the risk (0.0-1.0)

Output format:
{
  "project_name": "...",
  "description": "...",
  "contains_ai": true,
  "ai_confidence": 0.0,
  "high_risks": [
    { "description": "...", "category": "...", "eu_act_reference": "Article X", "confidence_score": 0.0 }
  ],
  "low_risks": []
}

Respond ONLY with valid JSON, no additional text.`;
}

export function buildJudgePrompt(
  documentText: string,
  analysis: Analysis,
  passages: readonly ContextPassage[]
): string {
  const context = passages
    .slice(0, JUDGE_CONTEXT_PASSAGES)
    .map((passage) => passage.text)
    .join("\n\n");

  return `You are evaluating the quality of an AI compliance analysis.

Original technical document (excerpt):
${documentText.slice(0, JUDGE_DOCUMENT_CHARS)}

EU AI Act context:
${context}

Analysis to evaluate:
${JSON.stringify(encodeAnalysis(analysis), null, 2)}

Criteria:
1. accuracy (0-1): are the identified AI components and risks accurate?
2. completeness (0-1): did the analysis cover all relevant aspects?
3. consistency (0-1): are the risk classifications consistent with the EU AI Act?

Output format:
{
  "accuracy_score": 0.0,
  "completeness_score": 0.0,
  "consistency_score": 0.0,
  "overall_score": 0.0,
  "reasoning": "..."
}

Respond ONLY with valid JSON.`;
}

/**
 * Analysis and judge calls over an Ollama completion client. Transport
 * failures surface as ModelCallError from the completion client; malformed
 * output surfaces as ParseError from the decoder.
 */
export function createOllamaAnalysisClient(
  completion: CompletionClient,
  options: AnalysisClientOptions
): AnalysisModelClient {
  const logger = options.logger ?? silentLogger;
  const judgeModel = options.judgeModel ?? options.model;

  return {
    async analyze(documentText, passages) {
      logger.info("Requesting compliance analysis", {
        model: options.model,
        passages: passages.length,
      });
      const content = await completion.generate(
        buildAnalysisPrompt(documentText, passages),
        { model: options.model, json: true, temperature: 0.3, maxTokens: 2000 }
      );
      logger.debug(`Raw analysis response: ${content.slice(0, 500)}`);
      return decodeAnalysis(parseModelJson(content));
    },

    async judge(documentText, analysis, passages) {
      logger.info("Requesting judge verdict", { model: judgeModel });
      const content = await completion.generate(
        buildJudgePrompt(documentText, analysis, passages),
        { model: judgeModel, json: true, temperature: 0.2, maxTokens: 1000 }
      );
      return decodeJudgeVerdict(parseModelJson(content));
    },
  };
}
