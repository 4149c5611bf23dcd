import os from "node:os";
import path from "node:path";
import fs from "node:fs";
import { randomUUID } from "node:crypto";

import { afterAll, beforeAll } from "vitest";

let tempDir: string | null = null;

function rmSafe(p: string | null): void {
  if (!p) { return; }
  fs.rmSync(p, { recursive: true, force: true });
}

beforeAll(() => {
  // Per-worker isolation. (Vitest may run tests in multiple workers.)
  const root = path.join(os.tmpdir(), `doc-retrieval-vitest-${process.pid}-${randomUUID()}`);
  tempDir = root;
  fs.mkdirSync(path.join(root, "uploads"), { recursive: true });

  process.env.NODE_ENV = "test";
  process.env.RAG_DB_PATH = path.join(root, "rag.sqlite");
  process.env.RAG_UPLOAD_DIR = path.join(root, "uploads");

  // Provider credentials from a developer shell must not leak into tests.
  for (const name of ["OPENAI_API_KEY", "RAG_OPENAI_API_KEY", "HF_TOKEN", "GOOGLE_API_KEY", "EMBEDDINGS_PROVIDER"]) {
    delete process.env[name];
  }
});

afterAll(() => {
  rmSafe(tempDir);
  tempDir = null;
});
