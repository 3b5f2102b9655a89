import fs from "fs";
import os from "os";
import path from "path";
import { Server } from "http";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { createContainer, Container } from "../container";
import { InMemoryJobStore } from "../modules/jobs/job.store";
import { Job } from "../modules/jobs/types";
import { APP_VERSION, createApp } from "../server/app";
import { FakeAnalysisClient, HashEmbeddingProvider, makeAnalysis, testConfig } from "./fakes";

/** Store whose reads fail, as a remote store would when its backend is down. */
class OfflineJobStore extends InMemoryJobStore {
  async get(_id: string): Promise<Job | undefined> {
    throw new Error("job store offline");
  }

  async list(): Promise<Job[]> {
    throw new Error("job store offline");
  }
}

async function listen(container: Container): Promise<{ server: Server; baseUrl: string }> {
  const server = createApp(container).listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Server did not bind to a TCP port");
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function base64(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

describe("HTTP API", () => {
  let dir: string;
  let container: Container;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "api-"));
    const corpusPath = path.join(dir, "reference.md");
    fs.writeFileSync(
      corpusPath,
      "Article 5 prohibits social scoring. Article 6 defines high-risk AI systems.",
      "utf8"
    );

    container = createContainer(
      testConfig({
        REFERENCE_CORPUS_PATH: corpusPath,
        MAX_FILE_SIZE_MB: "0.001",
        LLM_JUDGE_ENABLED: "false",
      }),
      {
        embedder: new HashEmbeddingProvider(),
        analysisClient: new FakeAnalysisClient(async () =>
          makeAnalysis({ projectName: "Booking site", description: "Books rooms." })
        ),
      }
    );

    ({ server, baseUrl } = await listen(container));
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function upload(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/api/upload`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });
  }

  it("reports an unindexed corpus on /health", async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      status: "healthy",
      version: APP_VERSION,
      vectorDbStatus: "not_indexed",
      llmStatus: "ready",
    });
  });

  it("indexes the reference corpus and reports stats", async () => {
    const indexed = await fetch(`${baseUrl}/api/index-corpus`, { method: "POST" });
    expect(indexed.status).toBe(200);
    expect(await indexed.json()).toMatchObject({ status: "success", chunks: 1 });

    const stats = await fetch(`${baseUrl}/api/vector-stats`);
    expect(await stats.json()).toEqual({
      collectionName: "eu_ai_act",
      totalDocuments: 1,
      indexed: true,
    });
  });

  it("accepts an upload and serves the finished job", async () => {
    const response = await upload({ fileName: "brief.txt", contentBase64: base64("Books rooms.") });
    expect(response.status).toBe(202);
    const accepted = (await response.json()) as { jobId: string; status: string };
    expect(accepted.status).toBe("pending");

    await container.orchestrator.whenSettled(accepted.jobId);

    const jobResponse = await fetch(`${baseUrl}/api/analyze/${accepted.jobId}`);
    expect(jobResponse.status).toBe(200);
    expect(await jobResponse.json()).toMatchObject({
      id: accepted.jobId,
      status: "completed",
      fileName: "brief.txt",
      analysis: { projectName: "Booking site" },
    });

    const list = (await (await fetch(`${baseUrl}/api/jobs`)).json()) as {
      jobs: Array<{ id: string }>;
    };
    expect(list.jobs.map((job) => job.id)).toContain(accepted.jobId);
  });

  it("rejects files with a disallowed extension", async () => {
    const response = await upload({ fileName: "run.exe", contentBase64: base64("MZ") });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Invalid file type. Allowed: pdf, docx, txt, md",
    });
  });

  it("rejects files over the size limit", async () => {
    const response = await upload({
      fileName: "big.txt",
      contentBase64: base64("a".repeat(2000)),
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "File too large. Max size: 0.001MB" });
  });

  it("requires a file name", async () => {
    const response = await upload({ contentBase64: base64("text") });
    expect(response.status).toBe(400);
  });

  it("returns 404 for an unknown job", async () => {
    const response = await fetch(`${baseUrl}/api/analyze/does-not-exist`);
    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Job not found" });
  });
});

describe("HTTP API with a failing job store", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const container = createContainer(testConfig(), {
      embedder: new HashEmbeddingProvider(),
      analysisClient: new FakeAnalysisClient(),
      store: new OfflineJobStore(),
    });
    ({ server, baseUrl } = await listen(container));
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve()))
    );
  });

  it("answers 500 when a job cannot be read", async () => {
    const response = await fetch(`${baseUrl}/api/analyze/some-job`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "job store offline" });
  });

  it("answers 500 when jobs cannot be listed", async () => {
    const response = await fetch(`${baseUrl}/api/jobs`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "job store offline" });
  });
});
