import { index, jsonb, pgTable, serial, text, timestamp } from 'drizzle-orm/pg-core';

/** Every resource shares this table; `resource` holds the descriptor name. */
export const resourceRecords = pgTable('resource_records', {
    id: serial('id').primaryKey(),
    resource: text('resource').notNull(),
    data: jsonb('data').$type<Record<string, unknown>>().notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
}, (table) => ({
    resourceIdx: index('resource_records_resource_idx').on(table.resource),
}));

export type ResourceRecordRow = typeof resourceRecords.$inferSelect;
