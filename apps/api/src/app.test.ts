import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import request from "supertest";
import { DEFAULT_INDEXING_PARAMS } from "@indexflow/config";
import { InMemoryDocumentStore } from "@indexflow/document-store";
import type { IEmbeddingProvider } from "@indexflow/embeddings";
import { createLogger } from "@indexflow/logger";
import { createDocumentId } from "@indexflow/preprocessor";
import type { EmbeddingResult } from "@indexflow/types";
import { createApp, type AppDependencies } from "./app.js";

class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly model = "fake-model";
  healthy = true;

  constructor(readonly dimensions = 768) {}

  async embed(text: string): Promise<EmbeddingResult> {
    return this.batchEmbed([text]);
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return {
      embeddings: texts.map(() => Array.from({ length: this.dimensions }, () => 0.5)),
      model: this.model,
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

describe("API", () => {
  let uploadDir: string;
  let store: InMemoryDocumentStore;
  let provider: FakeEmbeddingProvider;
  let deps: AppDependencies;

  beforeEach(async () => {
    uploadDir = await mkdtemp(join(tmpdir(), "indexflow-upload-"));
    store = new InMemoryDocumentStore({ embeddingDim: 768 });
    provider = new FakeEmbeddingProvider();
    deps = {
      logger: createLogger({ level: "silent" }),
      documentStore: store,
      embeddingProvider: provider,
      embeddingDim: 768,
      duplicateDocuments: "overwrite",
      pipelineDefaults: DEFAULT_INDEXING_PARAMS,
      uploadDir,
      rootPath: "/",
      concurrencyLimit: 4,
    };
  });

  afterEach(async () => {
    await rm(uploadDir, { recursive: true, force: true });
  });

  describe("POST /file-upload", () => {
    it("indexes text files into the collection named in meta", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .attach("files", Buffer.from("Alpha file content."), "alpha.txt")
        .attach("files", Buffer.from("Beta file content."), "beta.txt");

      expect(res.status).toBe(200);
      expect(res.text).toBe("");
      expect(store.listCollections()).toEqual(["docs-a"]);

      const docs = await store.getDocumentsById("docs-a", [
        createDocumentId("Alpha file content."),
        createDocumentId("Beta file content."),
      ]);
      expect(docs.map((d) => d.meta)).toEqual([
        { index: "docs-a", name: "alpha.txt", _split_id: 0 },
        { index: "docs-a", name: "beta.txt", _split_id: 0 },
      ]);
      expect(docs.map((d) => d.embedding?.length)).toEqual([768, 768]);
    });

    it("keeps non-ASCII filenames intact", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .attach("files", Buffer.from("Alpha file content."), "résumé.txt");

      expect(res.status).toBe(200);
      const docs = await store.getDocumentsById("docs-a", [createDocumentId("Alpha file content.")]);
      expect(docs.map((d) => d.meta["name"])).toEqual(["résumé.txt"]);
    });

    it("removes stored uploads after indexing", async () => {
      await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .attach("files", Buffer.from("Alpha file content."), "alpha.txt");

      expect(await readdir(uploadDir)).toEqual([]);
    });

    it("rejects metadata that is not an object before writing anything", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .set("X-Request-Id", "req-meta")
        .field("meta", "[1,2,3]")
        .attach("files", Buffer.from("Alpha file content."), "alpha.txt");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({
        success: false,
        error: {
          code: "INVALID_METADATA",
          message: "Metadata must be a JSON object, got array: [1,2,3]",
          requestId: "req-meta",
        },
      });
      expect(await readdir(uploadDir)).toEqual([]);
      expect(store.listCollections()).toEqual([]);
    });

    it("fails when the metadata names no collection", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .attach("files", Buffer.from("Alpha file content."), "alpha.txt");

      expect(res.status).toBe(500);
      expect(res.body.error.code).toBe("MISSING_COLLECTION");
      expect(store.listCollections()).toEqual([]);
    });

    it("applies per-request preprocessor overrides", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .field("split_by", "word")
        .field("split_length", "2")
        .attach("files", Buffer.from("one two three four five"), "words.txt");

      expect(res.status).toBe(200);
      expect(await store.countDocuments("docs-a")).toBe(3);
    });

    it("rejects invalid override values with per-field messages", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .field("split_by", "paragraph")
        .field("clean_whitespace", "maybe")
        .attach("files", Buffer.from("text"), "a.txt");

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("VALIDATION_ERROR");
      expect(Object.keys(res.body.error.details.fields).sort()).toEqual([
        "clean_whitespace",
        "split_by",
      ]);
    });

    it("rejects an overlap that is not smaller than the length", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .field("split_length", "3")
        .field("split_overlap", "3")
        .attach("files", Buffer.from("text"), "a.txt");

      expect(res.status).toBe(400);
      expect(res.body.error.details.fields).toEqual({
        split_overlap: "Must be smaller than split_length (3)",
      });
    });

    it("requires at least one file", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}');

      expect(res.status).toBe(400);
      expect(res.body.error.details.fields).toEqual({ files: "At least one file is required" });
    });

    it("accepts unsupported files without indexing them", async () => {
      const res = await request(createApp(deps))
        .post("/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .attach("files", Buffer.from("<p>hello</p>"), "page.html");

      expect(res.status).toBe(200);
      expect(store.listCollections()).toEqual([]);
      expect(await readdir(uploadDir)).toEqual([]);
    });

    it("is served under the configured root path", async () => {
      const app = createApp({ ...deps, rootPath: "/api" });

      const res = await request(app)
        .post("/api/file-upload")
        .field("meta", '{"index":"docs-a"}')
        .attach("files", Buffer.from("Alpha file content."), "alpha.txt");

      expect(res.status).toBe(200);
      expect(await store.countDocuments("docs-a")).toBe(1);
    });
  });

  describe("GET /health", () => {
    it("reports ok when every dependency is healthy", async () => {
      const res = await request(createApp(deps)).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "ok", checks: { documentStore: true, embeddings: true } });
    });

    it("reports degraded with 503 when a dependency is down", async () => {
      provider.healthy = false;

      const res = await request(createApp(deps)).get("/health");

      expect(res.status).toBe(503);
      expect(res.body).toEqual({
        status: "degraded",
        checks: { documentStore: true, embeddings: false },
      });
    });
  });

  it("returns 404 in the error envelope for unknown routes", async () => {
    const res = await request(createApp(deps)).get("/nope").set("X-Request-Id", "req-404");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      success: false,
      error: { code: "NOT_FOUND", message: "Route GET /nope not found", requestId: "req-404" },
    });
  });
});
