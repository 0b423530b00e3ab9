export interface ColloquyConfig {
  readonly logging: LoggingConfig;
  readonly providers: ProvidersConfig;
  readonly models: ModelCatalogEntry[];
  readonly streaming: StreamingConfig;
  readonly queue: QueueConfig;
  readonly memory: MemoryConfig;
  readonly initiation: InitiationConfig;
  readonly moderation: ModerationConfig;
  readonly health: HealthConfig;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface ProvidersConfig {
  readonly openrouterApiKey?: string;
  readonly openrouterBaseUrl: string;
  readonly anthropicApiKey?: string;
  readonly openaiApiKey?: string;
  readonly geminiApiKey?: string;
  readonly xaiApiKey?: string;
}

export interface ModelCatalogEntry {
  readonly modelId: string;
  readonly label?: string;
  /** Id understood by the provider's own API; enables direct routing. */
  readonly providerModelId?: string;
}

export interface StreamingConfig {
  readonly contentFlushMs: number;
  readonly reasoningFlushMs: number;
  readonly quietTools: string[];
  readonly maxToolRounds: number;
  readonly debug: boolean;
}

export interface QueueConfig {
  readonly pollIntervalMs: number;
  readonly concurrency: number;
  readonly batchSize: number;
}

export interface MemoryConfig {
  readonly idleThresholdMs: number;
  readonly chunkTargetTokens: number;
  readonly journalWindowMs: number;
  readonly coreTokenBudget: number;
  readonly refinementIntervalMs: number;
  readonly refinementOperationCap: number;
  readonly schedules: {
    readonly consolidation: string;
    readonly reflection: string;
    readonly refinement: string;
  };
}

export interface DaytimeWindow {
  /** Hour of day, inclusive. */
  readonly start: number;
  /** Hour of day, exclusive. */
  readonly end: number;
  readonly timezone: string;
}

export interface InitiationConfig {
  readonly enabled: boolean;
  readonly activityWindowMs: number;
  readonly recentInitiationWindowMs: number;
  readonly defaultCap: number;
  readonly agentOnlyCap: number;
  readonly jitterMs: number;
  readonly daytime: DaytimeWindow;
  readonly schedules: {
    readonly daytime: string;
    readonly nighttime?: string;
  };
}

export interface ModerationConfig {
  readonly enabled: boolean;
}

export interface HealthConfig {
  readonly enabled: boolean;
  readonly port: number;
  readonly hostname: string;
}
