/**
 * @fileoverview App Initializer - Wires the clipboard history core together
 * @module services/AppInitializer
 *
 * Initialization order:
 * 1. Configuration (defaults + environment + overrides)
 * 2. PersistenceService (history file location)
 * 3. HistoryManager (load persisted history, prime change detection)
 * 4. ClipboardPoller (start the fixed-period tick loop)
 *
 * Presentation code receives the HistoryManager and talks to it only.
 */

import type { IClipboardBackend } from './interfaces/IClipboardBackend';
import type { HistoryLoadResult } from './interfaces/IPersistenceService';
import { ClipboardPoller } from './ClipboardPoller';
import { HistoryManager } from '../data/HistoryManager';
import { PersistenceService } from '../data/PersistenceService';
import { createHistoryPathResolver } from '../data/storagePath';
import { loadConfig, type AppConfig } from '../core/AppConfig';

/**
 * App initializer options
 */
export interface AppInitializerOptions {
  /** Clipboard to watch */
  backend: IClipboardBackend;
  /** Values that win over defaults and environment */
  config?: Partial<AppConfig>;
  /** Environment to read configuration from (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Custom history file location; replaces the config-based resolver */
  resolveHistoryPath?: () => string;
}

export class AppInitializer {
  private readonly options: AppInitializerOptions;
  private config: AppConfig | null = null;
  private historyManager: HistoryManager | null = null;
  private poller: ClipboardPoller | null = null;
  private loadResult: HistoryLoadResult | null = null;
  private initializing: Promise<HistoryManager> | null = null;

  constructor(options: AppInitializerOptions) {
    this.options = options;
  }

  /**
   * Initialize the core and start polling.
   * Concurrent calls share one initialization.
   * @returns The history manager, once history is loaded
   */
  init(): Promise<HistoryManager> {
    if (!this.initializing) {
      this.initializing = this._initialize().catch((error: unknown) => {
        this.initializing = null;
        throw error;
      });
    }
    return this.initializing;
  }

  private async _initialize(): Promise<HistoryManager> {
    const config = loadConfig(this.options.env ?? process.env, this.options.config);
    this.config = config;

    const persistence = new PersistenceService(
      this.options.resolveHistoryPath ?? createHistoryPathResolver(config)
    );
    console.log(`[AppInitializer] History file: ${persistence.getFilePath()}`);

    const manager = new HistoryManager({
      backend: this.options.backend,
      persistence,
    });

    const loaded = await manager.init();
    this.loadResult = loaded;
    console.log(`[AppInitializer] ✅ History ready (${loaded.status}, ${loaded.entries.length} entries)`);

    const poller = new ClipboardPoller(
      async () => {
        await manager.pollOnce();
      },
      { intervalMs: config.pollIntervalMs }
    );
    poller.start();

    this.historyManager = manager;
    this.poller = poller;
    return manager;
  }

  getHistoryManager(): HistoryManager | null {
    return this.historyManager;
  }

  getPoller(): ClipboardPoller | null {
    return this.poller;
  }

  getConfig(): AppConfig | null {
    return this.config;
  }

  /**
   * Outcome of loading the persisted history. A 'failed' status means the
   * history was reset to empty.
   */
  getLoadResult(): HistoryLoadResult | null {
    return this.loadResult;
  }

  /**
   * Stop polling, wait for an in-flight tick and release the manager
   */
  async shutdown(): Promise<void> {
    if (this.initializing) {
      // A failed init() has already rejected to its own caller
      await Promise.allSettled([this.initializing]);
    }

    if (this.poller) {
      this.poller.stop();
      await this.poller.whenIdle();
      this.poller = null;
    }

    if (this.historyManager) {
      this.historyManager.dispose();
      this.historyManager = null;
    }

    this.initializing = null;
    console.log('[AppInitializer] Shutdown complete');
  }
}
