import * as fs from 'node:fs';
import * as path from 'node:path';

import * as dotenv from 'dotenv';
import pg from 'pg';

dotenv.config();

const MIGRATION_FILE = 'drizzle/0000_resource_records.sql';

const runMigration = async () => {
    if (!process.env.DATABASE_URL) {
        throw new Error('DATABASE_URL must be defined');
    }

    const pool = new pg.Pool({
        connectionString: process.env.DATABASE_URL
    });

    console.log('Creating resource_records table...');
    try {
        const sqlPath = path.join(process.cwd(), MIGRATION_FILE);
        const statements = fs.readFileSync(sqlPath, 'utf8')
            .split('--> statement-breakpoint')
            .map((statement) => statement.trim())
            .filter(Boolean);

        for (const statement of statements) {
            await pool.query(statement);
        }
        console.log('Migration complete!');
    } catch (e) {
        console.error('Migration failed', e);
        process.exitCode = 1;
    } finally {
        await pool.end();
    }
};

runMigration().catch((error) => {
    console.error(error);
    process.exit(1);
});
