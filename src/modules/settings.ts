// src/modules/settings.ts
import fs from "node:fs";
import * as dotenv from "dotenv";

// Load env before anything else.
// Priority: SYNC_DOTENV_FILE > .env
const envPath = process.env.SYNC_DOTENV_FILE ?? ".env";
dotenv.config({path: envPath});

export type Settings = {
    file: string;

    dbType: "mariadb" | "mysql";
    dbName: string;
    dbHost: string;
    dbPassword: string;
    dbPort: number;
    dbUser: string;

    // Remote library (Roon Core)
    roonHost: string;
    roonPort: number;
    roonTokenFile: string;
    roonExtensionId: string;
    roonConnectTimeoutMs: number;
    roonRetryAttempts: number;
    roonRetryDelayMs: number;
    physicalTags: string;

    // Marketplace catalog (Discogs)
    discogsToken: string;
    discogsUsername: string;
    discogsUserAgent: string;
    discogsPageDelayMs: number;
    discogsDetailDelayMs: number;
    discogsRateLimitCooldownMs: number;

    // Scheduling and batching
    skipDays: number;
    commitBatchSize: number;

    // File exports
    libraryTracksFile: string;
    playHistoryFile: string;

    initialized: boolean;
};

const defaults: Settings = {
    initialized: false,
    file: "./settings.csv",

    dbType: "mysql",
    dbHost: "localhost",
    dbPort: 3306,
    dbUser: "user",
    dbPassword: "password",
    dbName: "music_collection",

    roonHost: "localhost",
    roonPort: 9330,
    roonTokenFile: "./.roon_token",
    roonExtensionId: "collection_sync",
    roonConnectTimeoutMs: 15_000,
    roonRetryAttempts: 2,
    roonRetryDelayMs: 2_000,
    physicalTags: "myCDs,mYLps",

    discogsToken: "",
    discogsUsername: "",
    discogsUserAgent: "CollectionSync/1.0",
    discogsPageDelayMs: 1_000,
    discogsDetailDelayMs: 2_000,
    discogsRateLimitCooldownMs: 10_000,

    skipDays: 7,
    commitBatchSize: 1000,

    libraryTracksFile: "",
    playHistoryFile: "",
};

// CSV_KEY -> settings key
const keyMap: Record<string, keyof Settings> = {
    DB_TYPE: "dbType",
    DB_HOST: "dbHost",
    DB_PORT: "dbPort",
    DB_NAME: "dbName",
    DB_USER: "dbUser",
    DB_PASSWORD: "dbPassword",
    ROON_HOST: "roonHost",
    ROON_PORT: "roonPort",
    ROON_TOKEN_FILE: "roonTokenFile",
    ROON_EXTENSION_ID: "roonExtensionId",
    ROON_CONNECT_TIMEOUT_MS: "roonConnectTimeoutMs",
    ROON_RETRY_ATTEMPTS: "roonRetryAttempts",
    ROON_RETRY_DELAY_MS: "roonRetryDelayMs",
    PHYSICAL_TAGS: "physicalTags",
    DISCOGS_TOKEN: "discogsToken",
    DISCOGS_USERNAME: "discogsUsername",
    DISCOGS_USER_AGENT: "discogsUserAgent",
    DISCOGS_PAGE_DELAY_MS: "discogsPageDelayMs",
    DISCOGS_DETAIL_DELAY_MS: "discogsDetailDelayMs",
    DISCOGS_RATE_LIMIT_COOLDOWN_MS: "discogsRateLimitCooldownMs",
    SKIP_DAYS: "skipDays",
    COMMIT_BATCH_SIZE: "commitBatchSize",
    LIBRARY_TRACKS_FILE: "libraryTracksFile",
    PLAY_HISTORY_FILE: "playHistoryFile",
};

const toNumber = (v: string): number | undefined => {
    const n = Number(v.trim());
    return Number.isFinite(n) ? n : undefined;
};

// per-field coercion
const coerce: Partial<Record<keyof Settings, (v: string) => string | number | undefined>> = {
    dbPort: toNumber,
    roonPort: toNumber,
    roonConnectTimeoutMs: toNumber,
    roonRetryAttempts: toNumber,
    roonRetryDelayMs: toNumber,
    discogsPageDelayMs: toNumber,
    discogsDetailDelayMs: toNumber,
    discogsRateLimitCooldownMs: toNumber,
    skipDays: toNumber,
    commitBatchSize: toNumber,
    dbType: (v) => (v.trim() === "mariadb" ? "mariadb" : "mysql"),
};

function assign(target: Settings, key: keyof Settings, raw: string): void {
    const conv = coerce[key];
    const value = conv ? conv(raw) : raw;
    if (value === undefined) {
        console.warn(`[settings] Ignoring invalid value for ${key}: "${raw}"`);
        return;
    }
    Object.assign(target, {[key]: value});
}

// Apply environment variable overrides AFTER reading CSV.
// Example: DB_HOST > CSV value > default.
function applyEnvOverrides(target: Settings): void {
    for (const [csvKey, settingsKey] of Object.entries(keyMap)) {
        const raw = process.env[csvKey];
        if (raw === undefined || raw === "") continue;
        assign(target, settingsKey, raw);
    }

    // Allow overriding the settings file location itself.
    if (process.env.SETTINGS_FILE) {
        target.file = process.env.SETTINGS_FILE;
    }
}

/** Comma-separated physical-format tag names, trimmed, empties dropped. */
export function physicalTagList(value: Settings = settingsStore.value): string[] {
    return value.physicalTags
        .split(",")
        .map((t) => t.trim())
        .filter((t) => t.length > 0);
}

export class SettingsStore {
    private _settings: Settings = {...defaults};

    get value(): Settings {
        return this._settings;
    }

    /** Restore defaults; used by tests between cases. */
    reset(): void {
        this._settings = {...defaults};
    }

    async read(file = this._settings.file, forceCsv: boolean = false): Promise<void> {
        // If an env override for the file is present, prefer it.
        if (!forceCsv && process.env.SETTINGS_FILE) {
            file = process.env.SETTINGS_FILE;
            this._settings.file = file;
        }

        // If the CSV doesn't exist, create it from defaults.
        if (!fs.existsSync(file)) {
            await this.write(file);
            applyEnvOverrides(this._settings);
            this._settings.initialized = true;
            return;
        }

        // Parse CSV
        const text = fs.readFileSync(file, "utf8");
        for (const line of text.split(/\r?\n/)) {
            if (!line.trim()) continue;
            const [kRaw, ...rest] = line.split(",");
            const k = kRaw.trim();
            const vRaw = rest.join(","); // allow commas in values
            const mapKey = keyMap[k];
            if (!mapKey) {
                console.warn("Unknown setting:", k);
                continue;
            }
            assign(this._settings, mapKey, vRaw);
        }

        // Finally, apply env overrides on top.
        if (!forceCsv) applyEnvOverrides(this._settings);
        this._settings.initialized = true;
    }

    async write(file = this._settings.file): Promise<void> {
        const lines: string[] = [];
        for (const [csvKey, key] of Object.entries(keyMap)) {
            lines.push(`${csvKey},${String(this._settings[key])}`);
        }
        fs.writeFileSync(file, lines.join("\n") + "\n", "utf8");
        console.log("Settings file written!");
    }
}

const settingsStore = new SettingsStore();
export default settingsStore;
