/**
 * CRM Service — business rules over the CRM store
 *
 * Every mutation of a contact, deal or activity goes through here:
 *   - duplicate-email rejection on contact creation
 *   - lead score floored at zero
 *   - stage → probability on deal creation and stage transitions
 *   - deals and activities must reference an existing contact
 *   - created/updated timestamps and the contact's lastContact
 *
 * Lookups and "update if exists" operations return null on a miss.
 * Operations that need a valid reference throw NotFoundError.
 *
 * Usage:
 *   const service = new CRMService(store);
 *   const alice = service.addContact({ name: 'Alice', email: 'alice@example.com' });
 *   const deal = service.createDeal({ contactId: alice.id, title: 'Pilot', value: 12_000 });
 *   service.advanceDeal(deal.id, 'negotiation');
 *   service.logActivity({ contactId: alice.id, type: 'call', summary: 'Kickoff' });
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import type { CRMStore, RowChanges } from './crm-store.js';
import {
  ACTIVITY_DEFAULTS,
  DEAL_DEFAULTS,
  STAGE_PROBABILITY,
  activityToRow,
  contactDefaults,
  contactToRow,
  dealToRow,
  encodeTags,
  parseActivityType,
  parseContactStatus,
  parseDealStage,
  rowToActivity,
  rowToContact,
  rowToDeal,
  type Activity,
  type ActivityType,
  type Contact,
  type ContactStatus,
  type Deal,
  type DealStage,
} from './entities.js';
import { DuplicateEmailError, InvalidValueError, NotFoundError } from './errors.js';

const log = createLogger('crm-service');

// ─── Types ──────────────────────────────────────────────────────────────────

/** An enum value in stored form ('closed_won') or by name ('CLOSED_WON'). */
export type ContactStatusInput = ContactStatus | Uppercase<ContactStatus>;
export type DealStageInput = DealStage | Uppercase<DealStage>;
export type ActivityTypeInput = ActivityType | Uppercase<ActivityType>;

export interface AddContactInput {
  name: string;
  email: string;
  phone?: string;
  company?: string;
  title?: string;
  tags?: string[];
  owner?: string;
  source?: string;
  status?: ContactStatusInput;
}

export interface ContactFilter {
  status?: ContactStatusInput;
  owner?: string;
  tag?: string;
}

/** Fields a contact update may touch. Anything else is ignored. */
export interface ContactPatch {
  name?: string;
  phone?: string;
  company?: string;
  title?: string;
  tags?: string[];
  owner?: string;
  source?: string;
  status?: ContactStatusInput;
  lastContact?: string | null;
}

export interface CreateDealInput {
  contactId: string;
  title: string;
  value: number;
  stage?: DealStageInput;
  closeDate?: string | null;
  notes?: string;
}

export interface DealFilter {
  contactId?: string;
  stage?: DealStageInput;
}

/** Fields a deal update may touch. Stage changes go through advanceDeal. */
export interface DealPatch {
  title?: string;
  value?: number;
  closeDate?: string | null;
  notes?: string;
  probability?: number;
}

export interface LogActivityInput {
  contactId: string;
  type: ActivityTypeInput;
  summary: string;
  outcome?: string;
  nextAction?: string;
}

// ─── Input Schemas ──────────────────────────────────────────────────────────

const RequiredText = z.string().min(1, 'must not be empty');

const AddContactSchema = z.object({
  name: RequiredText,
  email: RequiredText,
  phone: z.string().optional(),
  company: z.string().optional(),
  title: z.string().optional(),
  tags: z.array(z.string()).optional(),
  owner: z.string().optional(),
  source: z.string().optional(),
  status: z.string().optional(),
});

// z.object strips unknown keys, which is what enforces the allow-lists.
const ContactPatchSchema = z.object({
  name: RequiredText.optional(),
  phone: z.string().optional(),
  company: z.string().optional(),
  title: z.string().optional(),
  tags: z.array(z.string()).optional(),
  owner: z.string().optional(),
  source: z.string().optional(),
  status: z.string().optional(),
  lastContact: z.string().nullable().optional(),
});

const DealValue = z.number().finite();
const Probability = z.number().min(0).max(1);

const CreateDealSchema = z.object({
  contactId: RequiredText,
  title: RequiredText,
  value: DealValue,
  stage: z.string().optional(),
  closeDate: z.string().nullable().optional(),
  notes: z.string().optional(),
});

const DealPatchSchema = z.object({
  title: RequiredText.optional(),
  value: DealValue.optional(),
  closeDate: z.string().nullable().optional(),
  notes: z.string().optional(),
  probability: Probability.optional(),
});

const LogActivitySchema = z.object({
  contactId: RequiredText,
  type: z.string(),
  summary: RequiredText,
  outcome: z.string().optional(),
  nextAction: z.string().optional(),
});

const ScoreDelta = z.number().int();

function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'input';
  const value =
    issue && typeof input === 'object' && input !== null && issue.path.length > 0
      ? Reflect.get(input, issue.path[0])
      : input;
  throw new InvalidValueError(field, value, issue?.message);
}

// ─── CRMService ─────────────────────────────────────────────────────────────

export class CRMService {
  private lastIssuedAt = 0;

  constructor(private readonly store: CRMStore) {}

  /**
   * ISO timestamp, strictly later than any this service issued before.
   * Writes within the same millisecond are spaced 1 ms apart.
   */
  private timestamp(): string {
    this.lastIssuedAt = Math.max(Date.now(), this.lastIssuedAt + 1);
    return new Date(this.lastIssuedAt).toISOString();
  }

  // ── Contacts ──────────────────────────────────────────────────────────────

  /**
   * Create a contact. Throws DuplicateEmailError when the email is taken
   * (exact, case-sensitive match); the store is left unchanged.
   */
  addContact(input: AddContactInput): Contact {
    const data = validate(AddContactSchema, input);
    const status = data.status === undefined ? undefined : parseContactStatus(data.status);

    const existing = this.getContactByEmail(data.email);
    if (existing) {
      log.warn({ email: data.email, existingId: existing.id }, 'Rejected duplicate contact email');
      throw new DuplicateEmailError(data.email, existing.id);
    }

    const defaults = contactDefaults();
    const contact: Contact = {
      ...defaults,
      id: randomUUID(),
      name: data.name,
      email: data.email,
      phone: data.phone ?? defaults.phone,
      company: data.company ?? defaults.company,
      title: data.title ?? defaults.title,
      tags: data.tags ? [...data.tags] : defaults.tags,
      owner: data.owner ?? defaults.owner,
      source: data.source ?? defaults.source,
      status: status ?? defaults.status,
      createdAt: this.timestamp(),
    };

    this.store.insert('contacts', contactToRow(contact));
    log.info({ contactId: contact.id, name: contact.name }, 'Contact created');

    return contact;
  }

  getContact(id: string): Contact | null {
    const row = this.store.findById('contacts', id);
    return row ? rowToContact(row) : null;
  }

  getContactByEmail(email: string): Contact | null {
    const [row] = this.store.findWhere('contacts', { email }, { limit: 1 });
    return row ? rowToContact(row) : null;
  }

  /**
   * Status and owner filter in SQL; tags are multi-valued so tag
   * membership is checked after decoding. Order is unspecified.
   */
  listContacts(filter: ContactFilter = {}): Contact[] {
    const status = filter.status === undefined ? undefined : parseContactStatus(filter.status);
    const contacts = this.store
      .findWhere('contacts', { status, owner: filter.owner })
      .map(rowToContact);

    const { tag } = filter;
    return tag === undefined ? contacts : contacts.filter((c) => c.tags.includes(tag));
  }

  /**
   * Partial update limited to the ContactPatch fields. Returns null when
   * the contact does not exist, and the unchanged contact for an empty patch.
   */
  updateContact(id: string, patch: ContactPatch): Contact | null {
    const data = validate(ContactPatchSchema, patch);

    const existing = this.getContact(id);
    if (!existing) return null;

    const changes: RowChanges<'contacts'> = {
      name: data.name,
      phone: data.phone,
      company: data.company,
      title: data.title,
      tags: data.tags === undefined ? undefined : encodeTags(data.tags),
      owner: data.owner,
      source: data.source,
      status: data.status === undefined ? undefined : parseContactStatus(data.status),
      last_contact: data.lastContact,
    };

    if (!this.store.updateById('contacts', id, changes)) {
      return existing;
    }

    log.info({ contactId: id, fields: Object.keys(data) }, 'Contact updated');
    return this.getContact(id);
  }

  /**
   * Add delta to the lead score, flooring the result at zero.
   * Returns the new score.
   */
  updateLeadScore(id: string, delta: number): number {
    const validDelta = validate(ScoreDelta, delta);

    const contact = this.getContact(id);
    if (!contact) {
      log.warn({ contactId: id }, 'Cannot update lead score: contact not found');
      throw new NotFoundError('contact', id);
    }

    const newScore = Math.max(0, contact.leadScore + validDelta);
    this.store.updateById('contacts', id, { lead_score: newScore });

    log.info({ contactId: id, delta: validDelta, newScore }, 'Lead score updated');
    return newScore;
  }

  /**
   * Delete a contact. Its deals and activities are left in place.
   */
  deleteContact(id: string): boolean {
    const deleted = this.store.deleteById('contacts', id);
    if (deleted) {
      log.info({ contactId: id }, 'Contact deleted');
    }
    return deleted;
  }

  // ── Deals ─────────────────────────────────────────────────────────────────

  createDeal(input: CreateDealInput): Deal {
    const data = validate(CreateDealSchema, input);
    const stage = data.stage === undefined ? DEAL_DEFAULTS.stage : parseDealStage(data.stage);

    if (!this.store.findById('contacts', data.contactId)) {
      log.warn({ contactId: data.contactId }, 'Cannot create deal: contact not found');
      throw new NotFoundError('contact', data.contactId);
    }

    const now = this.timestamp();
    const deal: Deal = {
      id: randomUUID(),
      contactId: data.contactId,
      title: data.title,
      value: data.value,
      stage,
      probability: STAGE_PROBABILITY[stage],
      closeDate: data.closeDate ?? DEAL_DEFAULTS.closeDate,
      notes: data.notes ?? DEAL_DEFAULTS.notes,
      createdAt: now,
      updatedAt: now,
    };

    this.store.insert('deals', dealToRow(deal));
    log.info({ dealId: deal.id, contactId: deal.contactId, stage, value: deal.value }, 'Deal created');

    return deal;
  }

  getDeal(id: string): Deal | null {
    const row = this.store.findById('deals', id);
    return row ? rowToDeal(row) : null;
  }

  listDeals(filter: DealFilter = {}): Deal[] {
    const stage = filter.stage === undefined ? undefined : parseDealStage(filter.stage);
    return this.store
      .findWhere('deals', { contact_id: filter.contactId, stage })
      .map(rowToDeal);
  }

  /**
   * Move a deal to a new stage. Probability is reset to the stage default,
   * discarding any override made through updateDeal.
   */
  advanceDeal(id: string, newStage: DealStageInput): Deal | null {
    const stage = parseDealStage(newStage);

    const updated = this.store.updateById('deals', id, {
      stage,
      probability: STAGE_PROBABILITY[stage],
      updated_at: this.timestamp(),
    });
    if (!updated) return null;

    log.info({ dealId: id, stage }, 'Deal advanced');
    return this.getDeal(id);
  }

  /**
   * Partial update limited to the DealPatch fields. updatedAt is refreshed
   * whenever at least one allowed field is present.
   */
  updateDeal(id: string, patch: DealPatch): Deal | null {
    const data = validate(DealPatchSchema, patch);

    const existing = this.getDeal(id);
    if (!existing) return null;

    const changes: RowChanges<'deals'> = {
      title: data.title,
      value: data.value,
      close_date: data.closeDate,
      notes: data.notes,
      probability: data.probability,
    };
    if (Object.values(changes).every((value) => value === undefined)) {
      return existing;
    }

    this.store.updateById('deals', id, { ...changes, updated_at: this.timestamp() });
    log.info({ dealId: id, fields: Object.keys(data) }, 'Deal updated');

    return this.getDeal(id);
  }

  // ── Activities ────────────────────────────────────────────────────────────

  /**
   * Record an activity and set the contact's lastContact to its timestamp.
   * Both writes happen in one transaction.
   */
  logActivity(input: LogActivityInput): Activity {
    const data = validate(LogActivitySchema, input);
    const type = parseActivityType(data.type);

    if (!this.store.findById('contacts', data.contactId)) {
      log.warn({ contactId: data.contactId }, 'Cannot log activity: contact not found');
      throw new NotFoundError('contact', data.contactId);
    }

    const activity: Activity = {
      id: randomUUID(),
      contactId: data.contactId,
      type,
      summary: data.summary,
      outcome: data.outcome ?? ACTIVITY_DEFAULTS.outcome,
      nextAction: data.nextAction ?? ACTIVITY_DEFAULTS.nextAction,
      recordedAt: this.timestamp(),
    };

    this.store.transaction(() => {
      this.store.insert('activities', activityToRow(activity));
      this.store.updateById('contacts', activity.contactId, { last_contact: activity.recordedAt });
    });

    log.info({ activityId: activity.id, contactId: activity.contactId, type }, 'Activity logged');
    return activity;
  }

  /**
   * Activities for a contact, most recent first.
   */
  listActivities(contactId: string): Activity[] {
    return this.store
      .findWhere(
        'activities',
        { contact_id: contactId },
        { orderBy: [{ column: 'recorded_at', direction: 'DESC' }] },
      )
      .map(rowToActivity);
  }
}
