import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { parseEnv } from "@quire/config";
import type { IEmbeddingProvider } from "@quire/embeddings";
import { createLogger } from "@quire/logger";
import { createContainer, createEmbeddings } from "./container.js";

const logger = createLogger({ level: "silent" });

describe("createEmbeddings", () => {
  it("returns null without a Cohere key", () => {
    expect(createEmbeddings(parseEnv({ NODE_ENV: "test" }), logger)).toBeNull();
  });

  it("builds the Cohere provider when a key is set", () => {
    const provider = createEmbeddings(
      parseEnv({ NODE_ENV: "test", COHERE_API_KEY: "test-secret" }),
      logger,
    );
    expect(provider?.name).toBe("cohere");
    expect(provider?.dimensions).toBe(1024);
  });

  it("builds the BGE-M3 provider when selected", () => {
    const provider = createEmbeddings(
      parseEnv({
        NODE_ENV: "test",
        EMBEDDING_PROVIDER: "bge-m3",
        BGE_M3_URL: "http://localhost:8080",
      }),
      logger,
    );
    expect(provider?.name).toBe("bge-m3");
  });
});

describe("createContainer", () => {
  it("wires an in-memory service that processes and answers", async () => {
    const dir = await mkdtemp(join(tmpdir(), "quire-container-"));
    const file = join(dir, "garden.md");
    await writeFile(
      file,
      "Tomatoes need full sun and regular watering. Basil grows well beside tomatoes.",
    );
    const container = createContainer(parseEnv({ NODE_ENV: "test" }), logger);

    try {
      const result = await container.service.process(file, "Garden");
      expect(result.status).toBe("ready");

      const answer = await container.service.ask("Where does basil grow well?");
      expect(answer?.tier).toBe("lexical");
      expect(answer?.citations.map((c) => c.title)).toEqual(["Garden"]);
      expect((await container.service.stats()).totalDocuments).toBe(1);
    } finally {
      await container.close();
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("checkHealth", () => {
  it("reports unconfigured backends as disabled", async () => {
    const container = createContainer(parseEnv({ NODE_ENV: "test" }), logger);

    expect(await container.checkHealth()).toEqual({
      repository: "ok",
      embeddings: "disabled",
      completion: "disabled",
    });
    await container.close();
  });

  it("reports a backend whose health check fails", async () => {
    const embeddings: IEmbeddingProvider = {
      name: "fake",
      dimensions: 1024,
      embed: async () => {
        throw new Error("unreachable");
      },
      batchEmbed: async () => {
        throw new Error("unreachable");
      },
      healthCheck: async () => false,
    };
    const container = createContainer(parseEnv({ NODE_ENV: "test" }), logger, { embeddings });

    expect((await container.checkHealth()).embeddings).toBe("failing");
    await container.close();
  });
});
