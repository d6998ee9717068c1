import { createApp } from './app';
import { loadConfig } from './config';
import { loadCatalog } from './services/catalog';
import { InMemoryPantryProvider, PantryInventoryProvider, loadPantrySnapshot } from './services/pantry';
import { RecipeRetrievalService } from './services/ranking';
import { VectorSearchService } from './services/vector';

async function main(): Promise<void> {
  const config = loadConfig();

  // Missing or malformed index files are fatal
  const catalog = await loadCatalog(config);

  // The vector backend is optional: exact-match ranking works without it
  let vectorSearch: VectorSearchService | null = null;
  if (config.vector) {
    vectorSearch = VectorSearchService.fromConfig(config.vector);
    await vectorSearch.init();
  } else {
    console.log('[Server] Vector backend not configured, semantic search disabled');
  }

  // Without a snapshot, callers must send pantry items themselves
  let pantryProvider: PantryInventoryProvider | null = null;
  if (config.pantryPath) {
    const items = await loadPantrySnapshot(config.pantryPath);
    pantryProvider = new InMemoryPantryProvider(items);
    console.log(`[Server] Loaded ${items.length} pantry items from ${config.pantryPath}`);
  } else {
    console.log('[Server] No pantry snapshot configured, requests must include pantry items');
  }

  const service = new RecipeRetrievalService(catalog, {
    vectorSearch,
    pantryProvider,
    candidatePoolSize: config.candidatePoolSize,
    includeSemanticOnly: config.includeSemanticOnly,
    expiringWithinDays: config.expiringWithinDays,
  });

  const server = createApp(service).listen(config.port, () => {
    console.log(`[Server] Recipe retrieval running on port ${config.port}`);
  });

  const shutdown = (): void => {
    server.close(() => {
      const closing = vectorSearch ? vectorSearch.close() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[Server] Shutdown failed:', err);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  console.error('[Server] Failed to start:', err);
  process.exit(1);
});
