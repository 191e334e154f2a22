import type { SirenConfig } from "./config/siren_config";
import {
  CachedVocabularyIndex,
  loadVocabularyIndex,
  type AuxiliaryIndex,
} from "./candidates/vocabulary_index";
import { HashEmbedder, type EmbeddingService } from "./embedding/hash_embedder";
import { createLogger, type SirenLogger } from "./logging/logger";
import { ResonanceMemory } from "./memory/resonance_memory";
import { DegradationCounter } from "./pipeline/degradation";
import { SessionRegistry } from "./pipeline/session_registry";
import { MemoryEmissionStore, type EmissionStore } from "./store/emission_store";
import { SqliteEmissionStore } from "./store/sqlite_emission_store";

export type SirenRuntimeDeps = {
  store?: EmissionStore;
  index?: AuxiliaryIndex | null;
  embedder?: EmbeddingService;
  log?: SirenLogger;
  now?: () => number;
};

export type SirenRuntime = {
  config: SirenConfig;
  log: SirenLogger;
  embedder: EmbeddingService;
  index: AuxiliaryIndex | null;
  memory: ResonanceMemory;
  degradations: DegradationCounter;
  sessions: SessionRegistry;
  close: () => Promise<void>;
};

/**
 * Wire one process worth of pipeline: store, memory, index and the session
 * registry. Explicit deps win; otherwise the config decides.
 */
export async function createSirenRuntime(
  config: SirenConfig,
  deps: SirenRuntimeDeps = {}
): Promise<SirenRuntime> {
  const log = deps.log ?? createLogger({ component: "siren" });
  const embedder = deps.embedder ?? new HashEmbedder(config.embeddingDim);
  const degradations = new DegradationCounter();

  const store =
    deps.store ??
    (config.memory.dbPath
      ? new SqliteEmissionStore(config.memory.dbPath, log)
      : new MemoryEmissionStore());

  let index: AuxiliaryIndex | null = deps.index ?? null;
  if (deps.index === undefined && config.server.vocabularyPath) {
    const loaded = await loadVocabularyIndex(config.server.vocabularyPath, embedder);
    index = new CachedVocabularyIndex(loaded, { maxEntries: config.server.indexCacheSize });
    log.info(
      { evt: "runtime.vocabulary_loaded", path: config.server.vocabularyPath, entries: loaded.size },
      "runtime.vocabulary_loaded"
    );
  }

  const memory = new ResonanceMemory({ store, config: config.memory, degradations, log });
  const sessions = new SessionRegistry({
    config,
    memory,
    degradations,
    log,
    index,
    embedder,
    now: deps.now,
  });

  return {
    config,
    log,
    embedder,
    index,
    memory,
    degradations,
    sessions,
    close: () => memory.close(),
  };
}
