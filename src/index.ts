import path from 'node:path';

import dotenv from 'dotenv';
import { sql } from 'drizzle-orm';
import { FastifyInstance } from 'fastify';

import { loadConfig } from './config.js';
import { createDatabase } from './db/index.js';
import { PersistenceCollaborator } from './interfaces/persistence.js';
import { buildServer } from './server.js';
import { DrizzlePersistence } from './services/drizzle-persistence.js';
import { MemoryPersistence } from './services/memory-persistence.js';
import { createRegistry, loadResourceConfig } from './services/resource-config.js';

dotenv.config();

type Runtime = {
    server: FastifyInstance;
    port: number;
    host: string;
    close: () => Promise<void>;
};

async function createRuntime(): Promise<Runtime> {
    const config = loadConfig();
    const registry = createRegistry(await loadResourceConfig(path.resolve(process.cwd(), config.resourceConfigPath)));

    let persistence: PersistenceCollaborator;
    let healthCheck: (() => Promise<void>) | undefined;
    let closeStorage: () => Promise<void> = async () => undefined;

    if (config.databaseUrl) {
        const { db, pool } = createDatabase(config.databaseUrl);
        persistence = new DrizzlePersistence(db, registry);
        healthCheck = async () => {
            await db.execute(sql`SELECT 1`);
        };
        closeStorage = async () => {
            await pool.end();
        };
    } else {
        persistence = new MemoryPersistence(registry);
    }

    const server = await buildServer({ config, registry, persistence, healthCheck });

    if (config.jwtSecretGenerated) {
        server.log.warn('JWT_SECRET is not set. Generated an ephemeral random secret for development.');
    }
    if (!config.databaseUrl) {
        server.log.warn('DATABASE_URL is not set. Using in-memory persistence; data is lost on restart.');
    }
    server.log.info({ resources: registry.list().map((descriptor) => descriptor.name) }, 'Resources loaded');

    return {
        server,
        port: config.port,
        host: config.host,
        close: async () => {
            await server.close();
            await closeStorage();
        }
    };
}

const start = async () => {
    let runtime: Runtime;
    try {
        runtime = await createRuntime();
    } catch (err) {
        console.error(err);
        process.exit(1);
    }

    const { server, port, host } = runtime;
    try {
        await server.listen({ port, host });
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }

    const shutdown = async (signal: string) => {
        server.log.info(`Received ${signal}, shutting down gracefully...`);
        try {
            await runtime.close();
            process.exit(0);
        } catch (err) {
            server.log.error(err, 'Error during shutdown');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));
};

void start();
