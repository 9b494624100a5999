import { randomBytes } from 'node:crypto';

export type AppConfig = {
    port: number;
    host: string;
    databaseUrl?: string;
    resourceConfigPath: string;
    defaultPageSize: number;
    maxPageSize: number;
    notFoundAsDenial: boolean;
    graphiql: boolean;
    jwtSecret: string;
    /** True when no JWT_SECRET was set and an ephemeral one was generated. */
    jwtSecretGenerated: boolean;
    logLevel: string;
    rateLimitMax: number;
};

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, minimum: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < minimum) {
        throw new Error(`${name} must be an integer of at least ${minimum}, received '${raw}'`);
    }
    return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    return raw.trim().toLowerCase() === 'true';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const production = env.NODE_ENV === 'production';

    let jwtSecret = env.JWT_SECRET;
    let jwtSecretGenerated = false;
    if (!jwtSecret) {
        if (production) {
            throw new Error('JWT_SECRET environment variable is strictly required in production.');
        }
        jwtSecret = randomBytes(32).toString('hex');
        jwtSecretGenerated = true;
    }

    const defaultPageSize = readInteger(env, 'DEFAULT_PAGE_SIZE', 30, 0);
    const maxPageSize = readInteger(env, 'MAX_PAGE_SIZE', 100, 1);

    return {
        port: readInteger(env, 'PORT', 4000, 0),
        host: env.HOST || '0.0.0.0',
        databaseUrl: env.DATABASE_URL || undefined,
        resourceConfigPath: env.RESOURCE_CONFIG_PATH || 'config/resources.json',
        defaultPageSize: Math.min(defaultPageSize, maxPageSize),
        maxPageSize,
        notFoundAsDenial: readBoolean(env, 'NOT_FOUND_AS_DENIAL', true),
        graphiql: readBoolean(env, 'GRAPHIQL', !production),
        jwtSecret,
        jwtSecretGenerated,
        logLevel: env.LOG_LEVEL || 'info',
        rateLimitMax: readInteger(env, 'RATE_LIMIT_MAX', 100, 1)
    };
}
