import { EvaluationMetricName } from "../../config/app.config";
import { Analysis, ContextPassage } from "../rag/types";

export interface EvaluationMetrics {
  faithfulness?: number;
  answerRelevance?: number;
  contextPrecision?: number;
  contextRecall?: number;
  overallScore: number;
}

export interface EvaluationInput {
  passages: readonly ContextPassage[];
  analysis: Analysis;
  documentText: string;
  enabledMetrics: readonly EvaluationMetricName[];
}
