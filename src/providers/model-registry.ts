import type { ModelCatalogEntry } from "../config/types.js";
import type { Logger } from "../logging/logger.js";

export type ModelIdSource = () => Promise<string[]>;

/**
 * Known models: the configured catalog plus whatever the OpenRouter model
 * listing reported on the last refresh.
 */
export class ModelRegistry {
  private readonly catalog = new Map<string, ModelCatalogEntry>();
  private remoteIds = new Set<string>();
  private listed = false;

  constructor(
    entries: readonly ModelCatalogEntry[],
    private readonly source: ModelIdSource | null,
    private readonly logger: Logger,
  ) {
    for (const entry of entries) this.catalog.set(entry.modelId, entry);
  }

  lookup(modelId: string): ModelCatalogEntry | null {
    return this.catalog.get(modelId) ?? null;
  }

  isKnown(modelId: string): boolean {
    return this.catalog.has(modelId) || this.remoteIds.has(modelId);
  }

  /**
   * Until a listing has been fetched every id counts as available; after
   * that only ids in the catalog or the listing do.
   */
  isAvailable(modelId: string): boolean {
    return !this.listed || this.isKnown(modelId);
  }

  /** Re-reads the remote model list; returns how many ids it reported. */
  async refresh(): Promise<number> {
    if (!this.source) {
      this.logger.warn("Model registry refresh skipped: no model listing available");
      return 0;
    }
    const ids = await this.source();
    this.remoteIds = new Set(ids);
    this.listed = true;
    this.logger.info({ models: ids.length }, "Model registry refreshed");
    return ids.length;
  }
}
