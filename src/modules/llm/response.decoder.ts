import { ParseError } from "../errors/errors";
import { Analysis, JudgeVerdict, Risk, RiskLevel } from "../rag/types";

/*
 * Single validation boundary between model output and typed records.
 * Missing optional fields take explicit defaults; present fields of the wrong
 * type or out of range are rejected rather than repaired.
 */

type JsonObject = Record<string, unknown>;

const CODE_FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseModelJson(content: string): unknown {
  let body = content.trim();
  const fenced = body.match(CODE_FENCE);
  if (fenced) {
    body = fenced[1].trim();
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new ParseError(
      `Model response is not valid JSON: ${body.slice(0, 200)}`,
      { cause: error }
    );
  }
}

function readString(source: JsonObject, key: string, fallback: string, path: string): string {
  const value = source[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "string") {
    throw new ParseError(`${path}.${key} must be a string`);
  }
  return value;
}

function readOptionalString(source: JsonObject, key: string, path: string): string | undefined {
  const value = readString(source, key, "", path).trim();
  return value.length > 0 ? value : undefined;
}

function readBoolean(source: JsonObject, key: string, fallback: boolean, path: string): boolean {
  const value = source[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "boolean") {
    throw new ParseError(`${path}.${key} must be a boolean`);
  }
  return value;
}

function toUnitScore(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ParseError(`${label} must be a number`);
  }
  if (value < 0 || value > 1) {
    throw new ParseError(`${label} must be between 0 and 1, got ${value}`);
  }
  return value;
}

function readOptionalScore(source: JsonObject, key: string, path: string): number | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  return toUnitScore(value, `${path}.${key}`);
}

function readRiskList(
  source: JsonObject,
  key: string,
  level: RiskLevel,
  path: string
): Risk[] {
  const value = source[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ParseError(`${path}.${key} must be an array`);
  }

  return value.map((item: unknown, index) => {
    const itemPath = `${path}.${key}[${index}]`;
    if (!isObject(item)) {
      throw new ParseError(`${itemPath} must be an object`);
    }
    const euReference = readOptionalString(item, "eu_act_reference", itemPath);
    const confidence = readOptionalScore(item, "confidence_score", itemPath);
    return {
      description: readString(item, "description", "", itemPath),
      category: readString(item, "category", "Unknown", itemPath),
      level,
      ...(euReference !== undefined ? { euReference } : {}),
      ...(confidence !== undefined ? { confidence } : {}),
    };
  });
}

export function decodeAnalysis(payload: unknown): Analysis {
  if (!isObject(payload)) {
    throw new ParseError("Analysis response must be a JSON object");
  }

  const path = "analysis";
  const highRisks = readRiskList(payload, "high_risks", "high", path);
  const lowRisks = readRiskList(payload, "low_risks", "low", path);

  return {
    projectName: readString(payload, "project_name", "Unknown Project", path),
    description: readString(payload, "description", "", path),
    containsAi: readBoolean(payload, "contains_ai", false, path),
    aiConfidence: readOptionalScore(payload, "ai_confidence", path) ?? 0,
    highRisks,
    lowRisks,
    metadata: {
      totalRisks: highRisks.length + lowRisks.length,
      highRiskCount: highRisks.length,
      lowRiskCount: lowRisks.length,
    },
  };
}

function readRequiredScore(source: JsonObject, name: string): number {
  const value = source[`${name}_score`] ?? source[name];
  if (value === undefined || value === null) {
    throw new ParseError(`judge.${name}_score is required`);
  }
  return toUnitScore(value, `judge.${name}_score`);
}

export function decodeJudgeVerdict(payload: unknown): JudgeVerdict {
  if (!isObject(payload)) {
    throw new ParseError("Judge response must be a JSON object");
  }

  const reasoning = payload.reasoning;
  if (typeof reasoning !== "string") {
    throw new ParseError("judge.reasoning must be a string");
  }

  return {
    accuracy: readRequiredScore(payload, "accuracy"),
    completeness: readRequiredScore(payload, "completeness"),
    consistency: readRequiredScore(payload, "consistency"),
    overall: readRequiredScore(payload, "overall"),
    reasoning,
  };
}

/** Wire shape of an analysis, as shown to the judge model. */
export function encodeAnalysis(analysis: Analysis): JsonObject {
  const encodeRisk = (risk: Risk): JsonObject => ({
    description: risk.description,
    category: risk.category,
    level: risk.level,
    eu_act_reference: risk.euReference ?? null,
    confidence_score: risk.confidence ?? null,
  });

  return {
    project_name: analysis.projectName,
    description: analysis.description,
    contains_ai: analysis.containsAi,
    ai_confidence: analysis.aiConfidence,
    high_risks: analysis.highRisks.map(encodeRisk),
    low_risks: analysis.lowRisks.map(encodeRisk),
    metadata: {
      total_risks: analysis.metadata.totalRisks,
      high_risk_count: analysis.metadata.highRiskCount,
      low_risk_count: analysis.metadata.lowRiskCount,
    },
  };
}
