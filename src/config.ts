export type Config = {
  // conversation engine
  maxMessageLength: number;
  historyCapacity: number;
  contextHistorySize: number;
  researchFollowUpDepth: number;
  // GenerateContent defaults
  generationTemperature: number;
  generationMaxTokens: number;
  // session plumbing
  autoSaveIntervalMs: number; // 0 disables auto-save
  confirmTimeoutMs: number;
  treeSnapshotFile: string;
  port: number;
  // assistant backend
  assistantTimeoutMs: number;
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
};

function intEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? Math.trunc(value) : fallback;
}

function floatEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

// Centralized config with sensible defaults; all values can be overridden via env.
export const config: Config = {
  maxMessageLength: intEnv('MAX_MESSAGE_LENGTH', 4000),
  historyCapacity: intEnv('HISTORY_CAPACITY', 100),
  contextHistorySize: intEnv('CONTEXT_HISTORY_SIZE', 5),
  researchFollowUpDepth: intEnv('RESEARCH_FOLLOW_UP_DEPTH', 1),
  generationTemperature: floatEnv('GENERATION_TEMPERATURE', 0.7),
  generationMaxTokens: intEnv('GENERATION_MAX_TOKENS', 1000),
  autoSaveIntervalMs: intEnv('AUTO_SAVE_INTERVAL_MS', 30000),
  confirmTimeoutMs: intEnv('CONFIRM_TIMEOUT_MS', 60000),
  treeSnapshotFile: process.env.TREE_SNAPSHOT_FILE ?? 'data/tree.json',
  port: intEnv('PORT', 3000),
  assistantTimeoutMs: intEnv('ASSISTANT_TIMEOUT_MS', 30000),
  openaiApiKey: process.env.OPENAI_API_KEY,
  openaiBaseUrl: process.env.OPENAI_BASE_URL,
  openaiModel: process.env.OPENAI_MODEL ?? 'gpt-4.1-mini'
};
