/**
 * Drizzle schema for the SQLite-backed vector store.
 */
import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const vectorRecords = sqliteTable('vector_records', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  text: text('text').notNull(),
  embedding: text('embedding', { mode: 'json' }).$type<number[]>().notNull(),
  metadata: text('metadata', { mode: 'json' })
    .$type<Record<string, string | number | boolean>>()
    .notNull(),
  createdAt: text('createdAt').notNull(),
});

export type VectorRecordRow = typeof vectorRecords.$inferSelect;
export type NewVectorRecordRow = typeof vectorRecords.$inferInsert;
