/**
 * @file Runtime Settings Service
 *
 * Run settings with central validation and deterministic precedence
 * (override > env > defaults).
 *
 * @module
 */

import path from 'path';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['silent', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const RootSchema = z
    .string()
    .min(1, 'root must not be empty')
    .refine((p: string): boolean => path.isAbsolute(p), 'root must be an absolute path');

const SettingsSchemas = {
    log_level: LogLevelSchema,
    root: RootSchema,
};

export interface RunSettings {
    log_level?: LogLevel;
    root?: string;
}

export type SettingsKey = keyof RunSettings;

export interface ResolvedRunSettings {
    log_level: LogLevel;
    root: string;
}

export type SettingSource = 'override' | 'env' | 'default';

const ENV_KEYS: Record<SettingsKey, string> = {
    log_level: 'TASKNODE_LOG_LEVEL',
    root: 'TASKNODE_ROOT',
};

type Environment = Record<string, string | undefined>;

export class SettingsService {
    private static singleton: SettingsService | null = null;
    private overrides: RunSettings = {};

    constructor(
        private readonly env: Environment = process.env,
        private readonly cwd: string = process.cwd(),
    ) {}

    /**
     * Resolve process-global singleton.
     */
    public static instance_get(): SettingsService {
        if (!SettingsService.singleton) {
            SettingsService.singleton = new SettingsService();
        }
        return SettingsService.singleton;
    }

    /**
     * Return effective settings.
     */
    public snapshot(): ResolvedRunSettings {
        return {
            log_level: this.logLevel_resolve(),
            root: this.root_resolve(),
        };
    }

    /**
     * Set one override with validation.
     */
    public set(key: SettingsKey, value: unknown): { ok: true; value: string } | { ok: false; error: string } {
        switch (key) {
            case 'log_level': {
                const parsed = SettingsSchemas.log_level.safeParse(value);
                if (!parsed.success) return { ok: false, error: this.issues_format(key, parsed.error) };
                this.overrides = { ...this.overrides, log_level: parsed.data };
                return { ok: true, value: parsed.data };
            }
            case 'root': {
                const parsed = SettingsSchemas.root.safeParse(value);
                if (!parsed.success) return { ok: false, error: this.issues_format(key, parsed.error) };
                this.overrides = { ...this.overrides, root: path.normalize(parsed.data) };
                return { ok: true, value: path.normalize(parsed.data) };
            }
            default:
                return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }
    }

    /**
     * Remove one override.
     */
    public unset(key: SettingsKey): void {
        const next: RunSettings = { ...this.overrides };
        delete next[key];
        this.overrides = next;
    }

    /**
     * Resolve the effective log level. Invalid env values fall through
     * to the default.
     */
    public logLevel_resolve(): LogLevel {
        if (this.overrides.log_level) return this.overrides.log_level;
        const fromEnv = LogLevelSchema.safeParse(this.env_read('log_level'));
        return fromEnv.success ? fromEnv.data : 'info';
    }

    /**
     * Resolve the project root used to anchor relative manifest paths.
     */
    public root_resolve(): string {
        if (this.overrides.root) return this.overrides.root;
        const fromEnv = RootSchema.safeParse(this.env_read('root'));
        return fromEnv.success ? path.normalize(fromEnv.data) : this.cwd;
    }

    /**
     * Resolve where the effective value of a setting comes from.
     */
    public source_resolve(key: SettingsKey): SettingSource {
        if (this.overrides[key] !== undefined) return 'override';
        if (SettingsSchemas[key].safeParse(this.env_read(key)).success) return 'env';
        return 'default';
    }

    private env_read(key: SettingsKey): string | undefined {
        const raw: string | undefined = this.env[ENV_KEYS[key]];
        if (!raw) return undefined;
        return raw.trim();
    }

    private issues_format(key: SettingsKey, error: z.ZodError): string {
        return `Invalid value for ${key}: ${error.issues.map((i) => i.message).join('; ')}`;
    }
}
