import path from 'node:path'
import { ConfigError, errorMessage } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_DIR, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    cliFlags?: Config
    projectDir?: string
    env?: NodeJS.ProcessEnv
    globalConfigFile?: string
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    if (!(await fs.exists(filePath))) return {}

    let raw: unknown
    try {
        raw = await fs.readJSON(filePath)
    } catch (error) {
        throw new ConfigError(`Config file ${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error })
    }

    const parsed = ConfigSchema.safeParse(raw)
    if (!parsed.success) {
        throw new ConfigError(`Config file ${filePath} is invalid: ${parsed.error.message}`)
    }
    return parsed.data
}

export function configFromEnv(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.DEMAND_AGENT_API_KEY) config.apiKey = env.DEMAND_AGENT_API_KEY
    if (env.DEMAND_AGENT_MODEL) config.model = env.DEMAND_AGENT_MODEL
    if (env.DEMAND_AGENT_BASE_URL) config.baseURL = env.DEMAND_AGENT_BASE_URL
    if (env.DEMAND_AGENT_LOG_LEVEL) {
        const level = LogLevelSchema.safeParse(env.DEMAND_AGENT_LOG_LEVEL)
        if (!level.success) throw new ConfigError(`DEMAND_AGENT_LOG_LEVEL is invalid: ${env.DEMAND_AGENT_LOG_LEVEL}`)
        config.logLevel = level.data
    }
    if (env.DATABASE_URL) config.database = { connectionString: env.DATABASE_URL }
    return config
}

/** Later configs win; nested sections are merged key by key. Absent keys never override. */
export function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.model !== undefined) merged.model = cfg.model
        if (cfg.apiKey !== undefined) merged.apiKey = cfg.apiKey
        if (cfg.baseURL !== undefined) merged.baseURL = cfg.baseURL
        if (cfg.temperature !== undefined) merged.temperature = cfg.temperature
        if (cfg.maxTokens !== undefined) merged.maxTokens = cfg.maxTokens
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
        if (cfg.dataDir !== undefined) merged.dataDir = cfg.dataDir
        if (cfg.llm) merged.llm = { ...merged.llm, ...cfg.llm }
        if (cfg.agent) merged.agent = { ...merged.agent, ...cfg.agent }
        if (cfg.capabilities) {
            merged.capabilities = {
                ...merged.capabilities,
                ...cfg.capabilities,
                timeouts: { ...merged.capabilities?.timeouts, ...cfg.capabilities.timeouts },
            }
        }
        if (cfg.freshness) merged.freshness = { ...merged.freshness, ...cfg.freshness }
        if (cfg.forecasting) merged.forecasting = { ...merged.forecasting, ...cfg.forecasting }
        if (cfg.database) merged.database = { ...merged.database, ...cfg.database }
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, cliFlags = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, options.globalConfigFile ?? GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: CLI flags > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, configFromEnv(env), cliFlags)

    return {
        model: merged.model ?? DEFAULT_CONFIG.model,
        apiKey: merged.apiKey ?? 'ollama',
        baseURL: merged.baseURL ?? DEFAULT_CONFIG.baseURL,
        temperature: merged.temperature ?? DEFAULT_CONFIG.temperature,
        maxTokens: merged.maxTokens ?? DEFAULT_CONFIG.maxTokens,
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        llm: { ...DEFAULT_CONFIG.llm, ...merged.llm },
        agent: { ...DEFAULT_CONFIG.agent, ...merged.agent },
        capabilities: {
            defaultTimeoutMs: merged.capabilities?.defaultTimeoutMs ?? DEFAULT_CONFIG.capabilities.defaultTimeoutMs,
            timeouts: { ...DEFAULT_CONFIG.capabilities.timeouts, ...merged.capabilities?.timeouts },
        },
        freshness: { ...DEFAULT_CONFIG.freshness, ...merged.freshness },
        forecasting: { ...DEFAULT_CONFIG.forecasting, ...merged.forecasting },
        database: { ...DEFAULT_CONFIG.database, ...merged.database },
        projectDir,
        configDir: CONFIG_DIR,
        dataDir: path.resolve(projectDir, merged.dataDir ?? LOCAL_CONFIG_DIR),
    }
}
