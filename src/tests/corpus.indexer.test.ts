import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { chunkText } from "../modules/chunker/chunker";
import { EmbeddingError, ExtractionError } from "../modules/errors/errors";
import { documentExtractor } from "../modules/extractor/document.extractor";
import { InMemoryVectorIndex } from "../modules/vector-db/memory.index";
import { chunkId, createCorpusIndexer } from "../modules/vector/corpus.indexer";
import { HashEmbeddingProvider } from "./fakes";

const CHUNKING = { targetSize: 60, overlap: 0 };
const SMALL_CHUNKING = { targetSize: 15, overlap: 0 };

const FIRST_CORPUS = [
  "Article 5 lists prohibited practices.",
  "Social scoring by public authorities is banned.",
  "Article 6 defines high-risk systems.",
  "Annex III names the high-risk areas.",
].join(" ");

const SECOND_CORPUS = [
  "Article 50 sets transparency obligations.",
  "Users must be told they talk to a chatbot.",
].join(" ");

const LONG_CORPUS = Array.from(
  { length: 40 },
  (_, i) => `Clause ${i + 1} applies to providers.`
).join(" ");

/** Fails once on the given call, then behaves like its parent. */
class FailingEmbeddingProvider extends HashEmbeddingProvider {
  calls = 0;

  constructor(public failOnCall?: number) {
    super();
  }

  async embed(text: string): Promise<number[]> {
    this.calls++;
    if (this.calls === this.failOnCall) {
      throw new EmbeddingError("Ollama is unreachable.");
    }
    return super.embed(text);
  }
}

describe("createCorpusIndexer", () => {
  let dir: string;
  let corpusPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "corpus-"));
    corpusPath = path.join(dir, "reference.txt");
    fs.writeFileSync(corpusPath, FIRST_CORPUS, "utf8");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function setup(embedder = new HashEmbeddingProvider(), chunking = CHUNKING) {
    const index = new InMemoryVectorIndex();
    const indexer = createCorpusIndexer({
      corpusPath,
      collection: "reference",
      chunking,
      extractor: documentExtractor,
      embedder,
      index,
    });
    return { embedder, index, indexer };
  }

  it("indexes every chunk with its id and metadata", async () => {
    const { index, indexer } = setup();
    const expected = chunkText(FIRST_CORPUS, 60, 0);

    const result = await indexer.indexReferenceCorpus();

    expect(result).toEqual({ chunks: expected.length, reindexed: true });
    expect(await index.count("reference")).toBe(expected.length);

    const passages = await index.query("reference", new Array<number>(64).fill(1), 10);
    const first = passages.find((passage) => passage.metadata.chunkIndex === 0);
    expect(first?.id).toMatch(/^eu_ai_act_chunk_0_[0-9a-f]{8}$/);
    expect(first?.metadata).toEqual({
      chunkIndex: 0,
      source: "eu_ai_act",
      totalChunks: expected.length,
    });
  });

  it("keeps an existing index unless forced", async () => {
    const { embedder, indexer } = setup();
    const first = await indexer.indexReferenceCorpus();
    const embedded = embedder.inputs.length;

    const second = await indexer.indexReferenceCorpus();

    expect(second).toEqual({ chunks: first.chunks, reindexed: false });
    expect(embedder.inputs).toHaveLength(embedded);
  });

  it("replaces the previous entries on a forced reindex", async () => {
    const { index, indexer } = setup();
    await indexer.indexReferenceCorpus();
    fs.writeFileSync(corpusPath, SECOND_CORPUS, "utf8");
    const newChunks = chunkText(SECOND_CORPUS, 60, 0);

    const result = await indexer.indexReferenceCorpus({ force: true });

    expect(result.chunks).toBe(newChunks.length);
    expect(await index.count("reference")).toBe(newChunks.length);
    const passages = await index.query("reference", new Array<number>(64).fill(1), 100);
    expect(passages.map((passage) => passage.text).sort()).toEqual([...newChunks].sort());
  });

  it("writes nothing when an embedding fails partway", async () => {
    fs.writeFileSync(corpusPath, LONG_CORPUS, "utf8");
    const embedder = new FailingEmbeddingProvider(21);
    const { index, indexer } = setup(embedder, SMALL_CHUNKING);
    const expected = chunkText(LONG_CORPUS, 15, 0);
    expect(expected).toHaveLength(40);

    const error = await indexer.indexReferenceCorpus().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(await index.count("reference")).toBe(0);

    const retried = await indexer.indexReferenceCorpus();

    expect(retried).toEqual({ chunks: 40, reindexed: true });
    expect(await index.count("reference")).toBe(40);
  });

  it("keeps the previous entries when a forced reindex fails", async () => {
    const embedder = new FailingEmbeddingProvider();
    const { index, indexer } = setup(embedder);
    const first = await indexer.indexReferenceCorpus();
    fs.writeFileSync(corpusPath, SECOND_CORPUS, "utf8");
    embedder.failOnCall = embedder.calls + 1;

    const error = await indexer
      .indexReferenceCorpus({ force: true })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(await index.count("reference")).toBe(first.chunks);
    const passages = await index.query("reference", new Array<number>(64).fill(1), 100);
    expect(passages.map((passage) => passage.text).sort()).toEqual(
      [...chunkText(FIRST_CORPUS, 60, 0)].sort()
    );
  });

  it("fails with a parse failure when the corpus file is missing", async () => {
    fs.rmSync(corpusPath);
    const { indexer } = setup();

    const error = await indexer.indexReferenceCorpus().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).toMatchObject({ reason: "parse_failure" });
  });

  it("reports collection stats", async () => {
    const { indexer } = setup();
    expect(await indexer.getCollectionStats()).toEqual({
      collectionName: "reference",
      totalDocuments: 0,
      indexed: false,
    });

    const { chunks } = await indexer.indexReferenceCorpus();

    expect(await indexer.getCollectionStats()).toEqual({
      collectionName: "reference",
      totalDocuments: chunks,
      indexed: true,
    });
  });
});

describe("chunkId", () => {
  it("is stable for the same chunk", () => {
    const chunk = { text: "Article 5", index: 3, sourceTag: "eu_ai_act" };
    expect(chunkId(chunk)).toBe(chunkId({ ...chunk }));
    expect(chunkId(chunk).startsWith("eu_ai_act_chunk_3_")).toBe(true);
  });
});
