import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { ErrorHandler } from '../utils/ErrorHandler';
import type { EventBus } from '../core/EventBus';

export const configSchema = z.object({
    serialEnabled: z.boolean(),
    serialPortPath: z.string().min(1),
    serialBaudRate: z.number().int().positive(),
    brokerEnabled: z.boolean(),
    brokerHost: z.string().min(1),
    brokerPort: z.number().int().min(1).max(65535),
    brokerTopic: z.string().min(1),
    brokerClientId: z.string().min(1),
    brokerConnectTimeoutMs: z.number().int().positive(),
    brokerPollIntervalMs: z.number().int().positive(),
    minDurationHours: z.number().min(0),
    maxDurationHours: z.number().positive(),
    defaultDurationHours: z.number().min(0),
    tickPeriodMs: z.number().int().positive()
});

export type FocusPodConfig = z.infer<typeof configSchema>;
export type ConfigKey = keyof FocusPodConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = configSchema.keyof().options;

export const DEFAULT_CONFIG: FocusPodConfig = {
    serialEnabled: true,
    serialPortPath: '/dev/ttyUSB0',
    serialBaudRate: 115200,
    brokerEnabled: false,
    brokerHost: '127.0.0.1',
    brokerPort: 1883,
    brokerTopic: 'topic/start',
    brokerClientId: 'focuspod-device-001',
    brokerConnectTimeoutMs: 5000,
    brokerPollIntervalMs: 100,
    minDurationHours: 0,
    maxDurationHours: 2,
    defaultDurationHours: 1,
    tickPeriodMs: 1000
};

const ENV_MAP: Record<string, ConfigKey> = {
    FOCUSPOD_SERIAL_ENABLED: 'serialEnabled',
    FOCUSPOD_SERIAL_PORT: 'serialPortPath',
    FOCUSPOD_SERIAL_BAUD: 'serialBaudRate',
    FOCUSPOD_BROKER_ENABLED: 'brokerEnabled',
    FOCUSPOD_BROKER_HOST: 'brokerHost',
    FOCUSPOD_BROKER_PORT: 'brokerPort',
    FOCUSPOD_BROKER_TOPIC: 'brokerTopic',
    FOCUSPOD_BROKER_CLIENT_ID: 'brokerClientId',
    FOCUSPOD_TICK_MS: 'tickPeriodMs'
};

const CONFIG_FILE = 'focuspod.config.yaml';

const yamlMapping = z.record(z.unknown());

export function isConfigKey(key: string): key is ConfigKey {
    return CONFIG_KEYS.some(k => k === key);
}

/**
 * Turns a command-line or environment string into the scalar it spells.
 */
export function parseScalar(raw: string): string | number | boolean {
    const trimmed = raw.trim();
    if (trimmed === 'true') return true;
    if (trimmed === 'false') return false;
    if (trimmed !== '' && Number.isFinite(Number(trimmed))) return Number(trimmed);
    return trimmed;
}

/**
 * Validates every recognized key on its own. A bad value is reported and
 * replaced by its default instead of failing the whole load.
 */
export function normalizeConfig(raw: Record<string, unknown>, silent: boolean = false): FocusPodConfig {
    const candidate: Record<string, unknown> = { ...DEFAULT_CONFIG };

    for (const key of CONFIG_KEYS) {
        const value = raw[key];
        if (value === undefined || value === null || value === '') continue;

        const parsed = configSchema.shape[key].safeParse(value);
        if (parsed.success) {
            candidate[key] = parsed.data;
        } else if (!silent) {
            logger.warn(`ConfigManager: Invalid value for ${key} (${JSON.stringify(value)}), using default ${JSON.stringify(DEFAULT_CONFIG[key])}`);
        }
    }

    for (const key of Object.keys(raw)) {
        if (!isConfigKey(key) && !silent) {
            logger.warn(`ConfigManager: Ignoring unknown option ${key}`);
        }
    }

    const config = configSchema.parse(candidate);

    if (config.minDurationHours > config.maxDurationHours) {
        if (!silent) {
            logger.warn(`ConfigManager: minDurationHours (${config.minDurationHours}) exceeds maxDurationHours (${config.maxDurationHours}), using default range`);
        }
        config.minDurationHours = DEFAULT_CONFIG.minDurationHours;
        config.maxDurationHours = DEFAULT_CONFIG.maxDurationHours;
    }

    return config;
}

export class ConfigManager {
    private configPath: string;
    private config: FocusPodConfig;
    private dataHome: string;

    constructor(private customPath?: string, private events?: EventBus) {
        this.dataHome = process.env.FOCUSPOD_DATA_DIR || path.join(os.homedir(), '.focuspod');

        const globalConfigPath = path.join(this.dataHome, CONFIG_FILE);
        const localConfigPath = path.resolve(process.cwd(), CONFIG_FILE);

        // Final config location: custom > local > global
        this.configPath = customPath || (fs.existsSync(localConfigPath) ? localConfigPath : globalConfigPath);
        this.config = this.loadConfig();
    }

    private readYaml(filePath: string): Record<string, unknown> {
        if (!fs.existsSync(filePath)) return {};
        try {
            const parsed = yamlMapping.safeParse(yaml.parse(fs.readFileSync(filePath, 'utf8')) ?? {});
            if (parsed.success) return parsed.data;
            logger.warn(`ConfigManager: ${filePath} does not contain a mapping, ignoring it`);
        } catch (e) {
            logger.warn(`ConfigManager: Error loading config from ${filePath}: ${ErrorHandler.describe(e)}`);
        }
        return {};
    }

    private loadConfig(silent: boolean = false): FocusPodConfig {
        const globalConfig = this.readYaml(path.join(this.dataHome, CONFIG_FILE));
        const localConfig = this.readYaml(path.resolve(process.cwd(), CONFIG_FILE));
        const customConfig = this.customPath ? this.readYaml(this.customPath) : {};

        if (!silent) logger.info(`ConfigManager: Config path set to ${this.configPath}`);

        const merged: Record<string, unknown> = {
            ...globalConfig,
            ...localConfig,
            ...customConfig
        };

        // Env vars only fill values the files leave unset
        for (const [envKey, key] of Object.entries(ENV_MAP)) {
            const raw = process.env[envKey];
            if (raw === undefined || raw.trim() === '') continue;
            const current = merged[key];
            if (current === undefined || current === null || current === '') {
                merged[key] = parseScalar(raw);
            } else if (!silent) {
                logger.info(`ConfigManager: Ignoring ${envKey} because config already defines ${key}`);
            }
        }

        return normalizeConfig(merged, silent);
    }

    public get<K extends ConfigKey>(key: K): FocusPodConfig[K] {
        return this.config[key];
    }

    /**
     * Validates and stores a single option, then writes the config file.
     * Returns false (and changes nothing) when the value is invalid.
     */
    public set(key: ConfigKey, value: unknown): boolean {
        const parsed = configSchema.shape[key].safeParse(value);
        if (!parsed.success) {
            logger.error(`ConfigManager: Rejected ${key}=${JSON.stringify(value)}: ${parsed.error.issues[0]?.message ?? 'invalid value'}`);
            return false;
        }

        const oldConfig = { ...this.config };
        const next = normalizeConfig({ ...this.config, [key]: parsed.data }, true);
        if (next[key] !== parsed.data) {
            logger.error(`ConfigManager: Rejected ${key}=${JSON.stringify(value)}: conflicts with the duration range`);
            return false;
        }

        this.config = next;
        this.saveConfig();
        this.events?.emit('config:changed', { oldConfig, newConfig: this.getAll() });
        logger.info(`ConfigManager: Config key '${key}' updated`);
        return true;
    }

    public saveConfig(): void {
        try {
            fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
            fs.writeFileSync(this.configPath, yaml.stringify(this.config));
            logger.info(`Configuration saved to ${this.configPath}`);
        } catch (error) {
            logger.error(`Error saving config: ${ErrorHandler.describe(error)}`);
        }
    }

    public getConfigPath(): string {
        return this.configPath;
    }

    public getAll(): FocusPodConfig {
        return { ...this.config };
    }
}
