import fetch, { Response } from "node-fetch";
import { errorMessage, ModelCallError } from "../errors/errors";
import { directCaller, ResilientCaller } from "../resilience/resilient.caller";

export interface GenerateOptions {
  model: string;
  /** Ask Ollama to constrain the output to JSON. */
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
}

export interface CompletionClient {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface OllamaClientOptions {
  baseUrl: string;
  caller?: ResilientCaller;
}

async function requestCompletion(
  baseUrl: string,
  prompt: string,
  options: GenerateOptions
): Promise<string> {
  let response: Response;
  try {
    response = await fetch(`${baseUrl}/api/generate`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: options.model,
        prompt,
        stream: false,
        ...(options.json ? { format: "json" } : {}),
        options: {
          ...(options.temperature !== undefined
            ? { temperature: options.temperature }
            : {}),
          ...(options.maxTokens !== undefined
            ? { num_predict: options.maxTokens }
            : {}),
        },
      }),
    });
  } catch (error) {
    throw new ModelCallError(`Ollama is not reachable: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!response.ok) {
    const text = await response.text();
    throw new ModelCallError(`Ollama error (${response.status}): ${text.slice(0, 200)}`);
  }

  let data: unknown;
  try {
    data = await response.json();
  } catch (error) {
    throw new ModelCallError(`Ollama returned invalid JSON: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  const completion =
    typeof data === "object" && data !== null && "response" in data
      ? data.response
      : undefined;

  if (typeof completion !== "string" || completion.length === 0) {
    throw new ModelCallError("Ollama returned an empty response.");
  }

  return completion;
}

export function createOllamaClient(options: OllamaClientOptions): CompletionClient {
  const caller = options.caller ?? directCaller;

  return {
    generate: (prompt, generateOptions) =>
      caller.call(() => requestCompletion(options.baseUrl, prompt, generateOptions)),
  };
}
