import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface SamplerSettings {
  temperature?: number;
  topP?: number;
  max_completion_tokens?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  stop?: string[];
  maxContextTokens?: number; // Maximum total context length in tokens
}

export interface DebugSettings {
  enabledNamespaces?: string;
}

export interface LLMProfile {
  type: 'openai' | 'custom'; // 'openai' uses OpenAI SDK, 'custom' uses axios against a completions endpoint
  apiKey?: string;
  baseURL: string;
  model?: string;
  sampler?: SamplerSettings;
  format?: 'json' | 'text';
}

export interface AgentConfig {
  llmProfile?: string;
  sampler?: SamplerSettings;
  model?: string;
  maxValidationRetries?: number;
}

export interface MemorySettings {
  /** Active-context cost (tokens) above which a natural break triggers compression. */
  budgetTokens: number;
  /** Cost at which compression is forced even without a break. */
  hardCeilingTokens: number;
  /** Upper bound for every summary the compressor produces. */
  summaryTargetTokens: number;
  /** Token size of each chunk handed to the summarizer. */
  chunkTokens: number;
  /** Trailing turns without NPC-relevant content that count as a topic shift. */
  idleTurnThreshold: number;
}

export interface PersistenceSettings {
  savesDir: string;
}

export interface Config {
  profiles: Record<string, LLMProfile>;
  defaultProfile: string;
  agents?: Record<string, AgentConfig>;
  memory?: Partial<MemorySettings>;
  persistence?: Partial<PersistenceSettings>;
  debug?: DebugSettings;
}

export const DEFAULT_MEMORY_SETTINGS: MemorySettings = {
  budgetTokens: 3000,
  hardCeilingTokens: 8000,
  summaryTargetTokens: 300,
  chunkTokens: 1500,
  idleTurnThreshold: 6
};

export const DEFAULT_PERSISTENCE_SETTINGS: PersistenceSettings = {
  savesDir: 'saves'
};

const MEMORY_KEYS = ['budgetTokens', 'hardCeilingTokens', 'summaryTargetTokens', 'chunkTokens', 'idleTurnThreshold'] as const;
const SAMPLER_NUMBER_KEYS = ['temperature', 'topP', 'max_completion_tokens', 'frequencyPenalty', 'presencePenalty', 'maxContextTokens'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function pickNumbers<K extends string>(source: Record<string, unknown>, keys: readonly K[]): Partial<Record<K, number>> {
  const picked: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'number' && Number.isFinite(value)) picked[key] = value;
  }
  return picked;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function toSampler(value: unknown): SamplerSettings | undefined {
  if (!isRecord(value)) return undefined;
  const sampler: SamplerSettings = pickNumbers(value, SAMPLER_NUMBER_KEYS);
  if (Array.isArray(value.stop)) {
    sampler.stop = value.stop.filter((s): s is string => typeof s === 'string');
  }
  return sampler;
}

export class ConfigManager {
  private config: Config;
  private readonly configPath: string;

  constructor(configPath: string = path.join(__dirname, '..', 'localConfig', 'config.json')) {
    this.configPath = configPath;
    this.config = this.loadConfig(configPath);
  }

  private loadConfig(configPath: string): Config {
    if (!fs.existsSync(configPath)) {
      // Create dummy config
      const dummyConfig: Config = {
        defaultProfile: 'openai',
        profiles: {
          openai: {
            type: 'openai',
            apiKey: 'replace-me',
            baseURL: 'https://api.openai.com/v1',
            model: 'gpt-4o-mini'
          }
        },
        agents: {
          summarize: { sampler: { temperature: 0.5 } },
          planner: { sampler: { temperature: 0.8 } }
        },
        memory: { ...DEFAULT_MEMORY_SETTINGS },
        persistence: { ...DEFAULT_PERSISTENCE_SETTINGS },
        debug: {
          enabledNamespaces: 'lorekeeper:campaign:*,lorekeeper:persistence:*'
        }
      };
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, JSON.stringify(dummyConfig, null, 2));
      return dummyConfig;
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return this.validateConfig(parsed);
  }

  private validateConfig(parsed: unknown): Config {
    if (!isRecord(parsed) || !isRecord(parsed.profiles) || typeof parsed.defaultProfile !== 'string') {
      throw new Error(`Config at ${this.configPath} needs "profiles" and "defaultProfile"`);
    }
    const config: Config = {
      profiles: {},
      defaultProfile: parsed.defaultProfile
    };
    for (const [name, profile] of Object.entries(parsed.profiles)) {
      if (!isRecord(profile) || typeof profile.baseURL !== 'string') {
        throw new Error(`Profile ${name} needs a baseURL`);
      }
      config.profiles[name] = {
        type: profile.type === 'custom' ? 'custom' : 'openai',
        baseURL: profile.baseURL,
        apiKey: optionalString(profile.apiKey),
        model: optionalString(profile.model),
        sampler: toSampler(profile.sampler),
        format: profile.format === 'json' ? 'json' : undefined
      };
    }
    if (isRecord(parsed.agents)) {
      config.agents = {};
      for (const [name, agent] of Object.entries(parsed.agents)) {
        if (!isRecord(agent)) continue;
        config.agents[name] = {
          llmProfile: optionalString(agent.llmProfile),
          model: optionalString(agent.model),
          sampler: toSampler(agent.sampler),
          ...pickNumbers(agent, ['maxValidationRetries'] as const)
        };
      }
    }
    if (isRecord(parsed.memory)) config.memory = pickNumbers(parsed.memory, MEMORY_KEYS);
    if (isRecord(parsed.persistence)) config.persistence = { savesDir: optionalString(parsed.persistence.savesDir) };
    if (isRecord(parsed.debug)) config.debug = { enabledNamespaces: optionalString(parsed.debug.enabledNamespaces) };

    const memory = this.resolveMemory(config);
    if (memory.hardCeilingTokens < memory.budgetTokens) {
      console.warn(`[configManager] memory.hardCeilingTokens (${memory.hardCeilingTokens}) is below budgetTokens (${memory.budgetTokens}); compression will always be forced.`);
    }
    return config;
  }

  private resolveMemory(config: Config): MemorySettings {
    const merged = { ...DEFAULT_MEMORY_SETTINGS };
    for (const key of MEMORY_KEYS) {
      const value = config.memory?.[key];
      if (typeof value === 'number' && value > 0) merged[key] = value;
    }
    return merged;
  }

  getProfile(name?: string): LLMProfile {
    const profileName = name || this.config.defaultProfile;
    const profile = this.config.profiles[profileName];
    if (!profile) {
      throw new Error(`Profile ${profileName} not found`);
    }
    return profile;
  }

  getConfig(): Config {
    return { ...this.config };
  }

  getMemorySettings(): MemorySettings {
    return this.resolveMemory(this.config);
  }

  getPersistenceSettings(): PersistenceSettings {
    const savesDir = this.config.persistence?.savesDir;
    return { savesDir: typeof savesDir === 'string' && savesDir ? savesDir : DEFAULT_PERSISTENCE_SETTINGS.savesDir };
  }

  reload(): void {
    this.config = this.loadConfig(this.configPath);
  }
}
