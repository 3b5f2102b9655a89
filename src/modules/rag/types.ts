export type PassageMetadata = Record<string, string | number | boolean>;

export interface Chunk {
  readonly text: string;
  readonly index: number;
  readonly sourceTag: string;
}

/**
 * A passage returned by the vector index. Lower distance means closer
 * (cosine distance), so ascending distance is the retrieval ranking.
 */
export interface ContextPassage {
  readonly id: string;
  readonly text: string;
  readonly distance: number;
  readonly metadata: PassageMetadata;
}

export type RiskLevel = "high" | "low" | "none";

export interface Risk {
  readonly description: string;
  readonly category: string;
  readonly level: RiskLevel;
  readonly euReference?: string;
  readonly confidence?: number;
}

export interface AnalysisMetadata {
  readonly totalRisks: number;
  readonly highRiskCount: number;
  readonly lowRiskCount: number;
}

export interface Analysis {
  readonly projectName: string;
  readonly description: string;
  readonly containsAi: boolean;
  readonly aiConfidence: number;
  readonly highRisks: readonly Risk[];
  readonly lowRisks: readonly Risk[];
  readonly metadata: AnalysisMetadata;
}

export interface JudgeVerdict {
  readonly accuracy: number;
  readonly completeness: number;
  readonly consistency: number;
  readonly overall: number;
  readonly reasoning: string;
}

export interface RetrievalOptions {
  topK?: number;
}
