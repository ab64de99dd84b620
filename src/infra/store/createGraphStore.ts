import { AppConfig } from "../../config/env.js";
import { ConfigError } from "../../domain/errors.js";
import { GraphStore } from "../../domain/graphStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryGraphStore } from "./inMemoryGraphStore.js";
import { Neo4jGraphStore, createNeo4jDriver } from "./neo4jGraphStore.js";
import { PersistentInMemoryGraphStore } from "./persistentInMemoryGraphStore.js";
import { PgVectorGraphStore } from "./pgVectorGraphStore.js";

/** Builds the configured store. Schema setup happens on `initialize()`. */
export function createGraphStore(config: AppConfig): GraphStore {
  const { store, embedding } = config;

  switch (store.kind) {
    case "memory":
      return new InMemoryGraphStore();
    case "file":
      return new PersistentInMemoryGraphStore(store.filePath, { maxBytes: store.maxFileBytes });
    case "neo4j": {
      if (!store.neo4jUri || !store.neo4jUser || !store.neo4jPassword) {
        throw new ConfigError("GRAPH_STORE=neo4j requires NEO4J_URI, NEO4J_USER and NEO4J_PASSWORD.");
      }
      const driver = createNeo4jDriver({
        uri: store.neo4jUri,
        user: store.neo4jUser,
        password: store.neo4jPassword,
        database: store.neo4jDatabase,
        timeoutMs: store.timeoutMs,
      });
      return new Neo4jGraphStore(driver, embedding.vectorDimension, store.neo4jDatabase, store.timeoutMs);
    }
    case "pgvector": {
      if (!store.databaseUrl) {
        throw new ConfigError("GRAPH_STORE=pgvector requires DATABASE_URL.");
      }
      return new PgVectorGraphStore(
        createPostgresPool(store.databaseUrl, store.timeoutMs),
        embedding.vectorDimension,
      );
    }
  }
}
