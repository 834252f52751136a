/**
 * CRM Entities — Contact, Deal, Activity
 *
 * Plain data shapes with their defaults, the enum vocabularies, the
 * stage→probability table and the mapping to and from stored rows.
 * No I/O happens here.
 *
 * Enum inputs are accepted either as the stored value ('closed_won') or
 * as the upper-case name ('CLOSED_WON'); anything else is rejected with
 * InvalidValueError.
 */

import { z } from 'zod';
import { InvalidValueError } from './errors.js';
import type { ActivityRow, ContactRow, DealRow } from './schema.js';

// ─── Enums ──────────────────────────────────────────────────────────────────

export const ContactStatus = {
  LEAD: 'lead',
  PROSPECT: 'prospect',
  CUSTOMER: 'customer',
  CHURNED: 'churned',
} as const;
export type ContactStatus = (typeof ContactStatus)[keyof typeof ContactStatus];
export const ContactStatusSchema = z.enum(['lead', 'prospect', 'customer', 'churned']);

export const DealStage = {
  PROSPECTING: 'prospecting',
  QUALIFIED: 'qualified',
  PROPOSAL: 'proposal',
  NEGOTIATION: 'negotiation',
  CLOSED_WON: 'closed_won',
  CLOSED_LOST: 'closed_lost',
} as const;
export type DealStage = (typeof DealStage)[keyof typeof DealStage];
export const DealStageSchema = z.enum([
  'prospecting',
  'qualified',
  'proposal',
  'negotiation',
  'closed_won',
  'closed_lost',
]);

export const ActivityType = {
  CALL: 'call',
  EMAIL: 'email',
  MEETING: 'meeting',
  DEMO: 'demo',
  FOLLOW_UP: 'follow_up',
} as const;
export type ActivityType = (typeof ActivityType)[keyof typeof ActivityType];
export const ActivityTypeSchema = z.enum(['call', 'email', 'meeting', 'demo', 'follow_up']);

/** Default win probability for each stage. */
export const STAGE_PROBABILITY: Readonly<Record<DealStage, number>> = {
  prospecting: 0.1,
  qualified: 0.25,
  proposal: 0.5,
  negotiation: 0.75,
  closed_won: 1.0,
  closed_lost: 0.0,
};

function parseEnum<T extends string>(allowed: readonly T[], field: string, input: string): T {
  const match = allowed.find((value) => value === input || value.toUpperCase() === input);
  if (match === undefined) {
    throw new InvalidValueError(field, input, `expected one of ${allowed.join(', ')}`);
  }
  return match;
}

export function parseContactStatus(input: string): ContactStatus {
  return parseEnum(ContactStatusSchema.options, 'status', input);
}

export function parseDealStage(input: string): DealStage {
  return parseEnum(DealStageSchema.options, 'stage', input);
}

export function parseActivityType(input: string): ActivityType {
  return parseEnum(ActivityTypeSchema.options, 'type', input);
}

// ─── Entities ───────────────────────────────────────────────────────────────

export interface Contact {
  id: string;
  name: string;
  email: string;
  phone: string;
  company: string;
  title: string;
  tags: string[];
  leadScore: number;
  status: ContactStatus;
  owner: string;
  source: string;
  createdAt: string;
  lastContact: string | null;
}

export interface Deal {
  id: string;
  contactId: string;
  title: string;
  value: number;
  stage: DealStage;
  probability: number;
  closeDate: string | null;
  notes: string;
  createdAt: string;
  updatedAt: string;
}

export interface Activity {
  id: string;
  contactId: string;
  type: ActivityType;
  summary: string;
  outcome: string;
  nextAction: string;
  recordedAt: string;
}

export type ContactDefaults = Omit<Contact, 'id' | 'name' | 'email' | 'createdAt'>;

/** A fresh set of contact defaults; the tag list is never shared. */
export function contactDefaults(): ContactDefaults {
  return {
    phone: '',
    company: '',
    title: '',
    tags: [],
    leadScore: 0,
    status: ContactStatus.LEAD,
    owner: '',
    source: '',
    lastContact: null,
  };
}

export const DEAL_DEFAULTS = {
  stage: DealStage.PROSPECTING,
  closeDate: null,
  notes: '',
} as const satisfies Partial<Deal>;

export const ACTIVITY_DEFAULTS = {
  outcome: '',
  nextAction: '',
} as const satisfies Partial<Activity>;

// ─── Tag Codec ──────────────────────────────────────────────────────────────

const TagListSchema = z.array(z.string());

/** Persisted form of a tag list: a JSON array string. */
export function encodeTags(tags: readonly string[]): string {
  return JSON.stringify(tags);
}

export function decodeTags(encoded: string): string[] {
  if (encoded === '') return [];
  const parsed = TagListSchema.safeParse(JSON.parse(encoded));
  if (!parsed.success) {
    throw new InvalidValueError('tags', encoded, 'stored tags are not a string array');
  }
  return parsed.data;
}

// ─── Row Mapping ────────────────────────────────────────────────────────────

export function contactToRow(contact: Contact): ContactRow {
  return {
    id: contact.id,
    name: contact.name,
    email: contact.email,
    phone: contact.phone,
    company: contact.company,
    title: contact.title,
    tags: encodeTags(contact.tags),
    lead_score: contact.leadScore,
    status: contact.status,
    owner: contact.owner,
    source: contact.source,
    created_at: contact.createdAt,
    last_contact: contact.lastContact,
  };
}

export function rowToContact(row: ContactRow): Contact {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    phone: row.phone,
    company: row.company,
    title: row.title,
    tags: decodeTags(row.tags),
    leadScore: row.lead_score,
    status: parseContactStatus(row.status),
    owner: row.owner,
    source: row.source,
    createdAt: row.created_at,
    lastContact: row.last_contact,
  };
}

export function dealToRow(deal: Deal): DealRow {
  return {
    id: deal.id,
    contact_id: deal.contactId,
    title: deal.title,
    value: deal.value,
    stage: deal.stage,
    probability: deal.probability,
    close_date: deal.closeDate,
    notes: deal.notes,
    created_at: deal.createdAt,
    updated_at: deal.updatedAt,
  };
}

export function rowToDeal(row: DealRow): Deal {
  return {
    id: row.id,
    contactId: row.contact_id,
    title: row.title,
    value: row.value,
    stage: parseDealStage(row.stage),
    probability: row.probability,
    closeDate: row.close_date,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function activityToRow(activity: Activity): ActivityRow {
  return {
    id: activity.id,
    contact_id: activity.contactId,
    type: activity.type,
    summary: activity.summary,
    outcome: activity.outcome,
    next_action: activity.nextAction,
    recorded_at: activity.recordedAt,
  };
}

export function rowToActivity(row: ActivityRow): Activity {
  return {
    id: row.id,
    contactId: row.contact_id,
    type: parseActivityType(row.type),
    summary: row.summary,
    outcome: row.outcome,
    nextAction: row.next_action,
    recordedAt: row.recorded_at,
  };
}
