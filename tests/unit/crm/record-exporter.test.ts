import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { CRMStore } from '../../../src/crm/crm-store.js';
import { CRMService } from '../../../src/crm/crm-service.js';
import { InvalidValueError } from '../../../src/crm/errors.js';
import { RecordExporter, parseExportFormat, toCsv } from '../../../src/crm/record-exporter.js';

const CONTACT_HEADER =
  'id,name,email,phone,company,title,tags,lead_score,status,owner,source,created_at,last_contact';
const DEAL_HEADER = 'id,contact_id,title,value,stage,probability,close_date,notes,created_at,updated_at';

describe('RecordExporter', () => {
  let store: CRMStore;
  let service: CRMService;
  let exporter: RecordExporter;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-01-01T00:00:00.000Z'));
    store = new CRMStore(':memory:');
    store.init();
    service = new CRMService(store);
    exporter = new RecordExporter(service);
  });

  afterEach(() => {
    store.close();
    vi.useRealTimers();
  });

  describe('toCsv', () => {
    it('should quote cells with commas, quotes or newlines', () => {
      expect(toCsv(['a', 'b', 'c'], [['x,y', 'say "hi"', 'two\nlines']])).toBe(
        'a,b,c\n"x,y","say ""hi""","two\nlines"\n',
      );
    });

    it('should write null as an empty field', () => {
      expect(toCsv(['a', 'b'], [[null, 3]])).toBe('a,b\n,3\n');
    });

    it('should write only the header for no records', () => {
      expect(toCsv(['a', 'b'], [])).toBe('a,b\n');
    });
  });

  describe('exportContacts', () => {
    it('should write the header only for an empty store', () => {
      expect(exporter.exportContacts('csv')).toBe(`${CONTACT_HEADER}\n`);
      expect(exporter.exportContacts('json')).toBe('[]');
    });

    it('should write one CSV row per contact with tags joined by |', () => {
      const contact = service.addContact({
        name: 'Smith, Jane',
        email: 'jane@example.com',
        company: 'Acme',
        tags: ['vip', 'enterprise'],
      });

      const lines = exporter.exportContacts().split('\n');

      expect(lines[0]).toBe(CONTACT_HEADER);
      expect(lines[1]).toBe(
        `${contact.id},"Smith, Jane",jane@example.com,,Acme,,vip|enterprise,0,lead,,,2025-01-01T00:00:00.000Z,`,
      );
      expect(lines).toHaveLength(3);
      expect(lines[2]).toBe('');
    });

    it('should keep tags as an array and nulls as null in JSON', () => {
      service.addContact({ name: 'Jane', email: 'jane@example.com', tags: ['vip'] });

      const [record] = z.array(z.record(z.unknown())).parse(JSON.parse(exporter.exportContacts('json')));

      expect(record?.tags).toEqual(['vip']);
      expect(record?.last_contact).toBeNull();
      expect(Object.keys(record ?? {})).toEqual(CONTACT_HEADER.split(','));
    });

    it('should round-trip the set of emails through JSON', () => {
      const emails = ['a@example.com', 'b@example.com', 'c@example.com'];
      for (const email of emails) {
        service.addContact({ name: email, email });
      }

      const parsed = z
        .array(z.object({ email: z.string() }))
        .parse(JSON.parse(exporter.exportContacts('json')));

      expect(new Set(parsed.map((r) => r.email))).toEqual(new Set(emails));
    });
  });

  describe('exportDeals', () => {
    it('should write deals in column order', () => {
      const contact = service.addContact({ name: 'Jane', email: 'jane@example.com' });
      const deal = service.createDeal({
        contactId: contact.id,
        title: 'Pilot',
        value: 12_000,
        stage: 'proposal',
        notes: 'Needs "legal" review',
      });

      const lines = exporter.exportDeals('csv').split('\n');

      expect(lines[0]).toBe(DEAL_HEADER);
      expect(lines[1]).toBe(
        `${deal.id},${contact.id},Pilot,12000,proposal,0.5,,"Needs ""legal"" review",2025-01-01T00:00:00.001Z,2025-01-01T00:00:00.001Z`,
      );
    });

    it('should write deals as JSON rows', () => {
      const contact = service.addContact({ name: 'Jane', email: 'jane@example.com' });
      const deal = service.createDeal({ contactId: contact.id, title: 'Pilot', value: 500 });

      expect(JSON.parse(exporter.exportDeals('json'))).toEqual([
        {
          id: deal.id,
          contact_id: contact.id,
          title: 'Pilot',
          value: 500,
          stage: 'prospecting',
          probability: 0.1,
          close_date: null,
          notes: '',
          created_at: '2025-01-01T00:00:00.001Z',
          updated_at: '2025-01-01T00:00:00.001Z',
        },
      ]);
    });
  });

  describe('parseExportFormat', () => {
    it('should accept csv and json', () => {
      expect(parseExportFormat('csv')).toBe('csv');
      expect(parseExportFormat('json')).toBe('json');
    });

    it('should reject anything else with InvalidValueError', () => {
      expect(() => parseExportFormat('xml')).toThrow(InvalidValueError);
      expect(() => parseExportFormat('xml')).toThrow(`Invalid value for format: "xml" (expected 'csv' or 'json')`);
    });
  });
});
