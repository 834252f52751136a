/**
 * CRM Schema — table layout, indexes and row decoding
 *
 * Rows are the persisted, snake_case shape of each entity. They are
 * validated with zod on the way out of SQLite so the rest of the code
 * never touches an untyped row.
 *
 * contacts.email carries a UNIQUE constraint. The REFERENCES clauses on
 * deals/activities document the relationship; foreign key enforcement
 * stays off so deleting a contact leaves its deals and activities in place.
 */

import { z } from 'zod';

// ─── DDL ────────────────────────────────────────────────────────────────────

export const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS contacts (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    email TEXT UNIQUE NOT NULL,
    phone TEXT NOT NULL DEFAULT '',
    company TEXT NOT NULL DEFAULT '',
    title TEXT NOT NULL DEFAULT '',
    tags TEXT NOT NULL DEFAULT '[]',
    lead_score INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL DEFAULT 'lead',
    owner TEXT NOT NULL DEFAULT '',
    source TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    last_contact TEXT
  );

  CREATE TABLE IF NOT EXISTS deals (
    id TEXT PRIMARY KEY,
    contact_id TEXT NOT NULL REFERENCES contacts(id),
    title TEXT NOT NULL,
    value REAL NOT NULL DEFAULT 0,
    stage TEXT NOT NULL DEFAULT 'prospecting',
    probability REAL NOT NULL DEFAULT 0.10,
    close_date TEXT,
    notes TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS activities (
    id TEXT PRIMARY KEY,
    contact_id TEXT NOT NULL REFERENCES contacts(id),
    type TEXT NOT NULL,
    summary TEXT NOT NULL,
    outcome TEXT NOT NULL DEFAULT '',
    next_action TEXT NOT NULL DEFAULT '',
    recorded_at TEXT NOT NULL
  );
`;

export const CREATE_INDEX_SQL = `
  CREATE INDEX IF NOT EXISTS idx_deals_contact ON deals(contact_id);
  CREATE INDEX IF NOT EXISTS idx_activities_contact ON activities(contact_id);
  CREATE INDEX IF NOT EXISTS idx_contacts_status ON contacts(status);
  CREATE INDEX IF NOT EXISTS idx_deals_stage ON deals(stage);
`;

// ─── Row Schemas ────────────────────────────────────────────────────────────

export const ContactRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  company: z.string(),
  title: z.string(),
  tags: z.string(),
  lead_score: z.number().int(),
  status: z.string(),
  owner: z.string(),
  source: z.string(),
  created_at: z.string(),
  last_contact: z.string().nullable(),
});
export type ContactRow = z.infer<typeof ContactRowSchema>;

export const DealRowSchema = z.object({
  id: z.string(),
  contact_id: z.string(),
  title: z.string(),
  value: z.number(),
  stage: z.string(),
  probability: z.number(),
  close_date: z.string().nullable(),
  notes: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type DealRow = z.infer<typeof DealRowSchema>;

export const ActivityRowSchema = z.object({
  id: z.string(),
  contact_id: z.string(),
  type: z.string(),
  summary: z.string(),
  outcome: z.string(),
  next_action: z.string(),
  recorded_at: z.string(),
});
export type ActivityRow = z.infer<typeof ActivityRowSchema>;

// ─── Table Registry ─────────────────────────────────────────────────────────

export interface TableRows {
  contacts: ContactRow;
  deals: DealRow;
  activities: ActivityRow;
}

export type TableName = keyof TableRows;

export type ColumnOf<T extends TableName> = keyof TableRows[T] & string;

export const ROW_SCHEMAS: { [K in TableName]: z.ZodType<TableRows[K]> } = {
  contacts: ContactRowSchema,
  deals: DealRowSchema,
  activities: ActivityRowSchema,
};

/** Column order for each table; also the export field order. */
export const TABLE_COLUMNS: { readonly [K in TableName]: ReadonlyArray<ColumnOf<K>> } = {
  contacts: [
    'id', 'name', 'email', 'phone', 'company', 'title', 'tags',
    'lead_score', 'status', 'owner', 'source', 'created_at', 'last_contact',
  ],
  deals: [
    'id', 'contact_id', 'title', 'value', 'stage', 'probability',
    'close_date', 'notes', 'created_at', 'updated_at',
  ],
  activities: [
    'id', 'contact_id', 'type', 'summary', 'outcome', 'next_action', 'recorded_at',
  ],
};
