import { describe, it, expect } from 'vitest';
import {
  STAGE_PROBABILITY,
  contactDefaults,
  contactToRow,
  decodeTags,
  encodeTags,
  parseActivityType,
  parseContactStatus,
  parseDealStage,
  rowToContact,
  type Contact,
} from '../../../src/crm/entities.js';
import { InvalidValueError } from '../../../src/crm/errors.js';

describe('CRM entities', () => {
  describe('STAGE_PROBABILITY', () => {
    it('should map each stage to its default probability', () => {
      expect(STAGE_PROBABILITY).toEqual({
        prospecting: 0.1,
        qualified: 0.25,
        proposal: 0.5,
        negotiation: 0.75,
        closed_won: 1.0,
        closed_lost: 0.0,
      });
    });
  });

  describe('enum parsing', () => {
    it('should accept stored values', () => {
      expect(parseDealStage('closed_won')).toBe('closed_won');
      expect(parseContactStatus('customer')).toBe('customer');
      expect(parseActivityType('follow_up')).toBe('follow_up');
    });

    it('should accept upper-case names', () => {
      expect(parseDealStage('QUALIFIED')).toBe('qualified');
      expect(parseContactStatus('CHURNED')).toBe('churned');
      expect(parseActivityType('DEMO')).toBe('demo');
    });

    it('should reject unrecognized values with InvalidValueError', () => {
      expect(() => parseDealStage('won')).toThrow(InvalidValueError);
      expect(() => parseActivityType('')).toThrow(InvalidValueError);
    });

    it('should reject mixed-case spellings', () => {
      expect(() => parseDealStage('Closed_Won')).toThrow(InvalidValueError);
      expect(() => parseContactStatus('Lead')).toThrow(InvalidValueError);
      expect(() => parseActivityType('Follow_Up')).toThrow(InvalidValueError);
    });

    it('should name the field in the error', () => {
      try {
        parseContactStatus('vip');
        expect.unreachable('parseContactStatus should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidValueError);
        if (error instanceof InvalidValueError) {
          expect(error.field).toBe('status');
          expect(error.value).toBe('vip');
          expect(error.code).toBe('INVALID_VALUE');
        }
      }
    });
  });

  describe('tag codec', () => {
    it('should store tags as a JSON array string', () => {
      expect(encodeTags(['a', 'b'])).toBe('["a","b"]');
    });

    it('should decode what it encodes, including delimiters inside tags', () => {
      const tags = ['a|b', 'c,d', 'e "quoted"'];
      expect(decodeTags(encodeTags(tags))).toEqual(tags);
    });

    it('should decode an empty string as no tags', () => {
      expect(decodeTags('')).toEqual([]);
    });

    it('should reject stored tags that are not a string array', () => {
      expect(() => decodeTags('[1,2]')).toThrow(InvalidValueError);
    });
  });

  describe('contactDefaults', () => {
    it('should return a fresh tag list each time', () => {
      const first = contactDefaults();
      first.tags.push('mutated');
      expect(contactDefaults().tags).toEqual([]);
    });

    it('should default status to lead and score to 0', () => {
      const defaults = contactDefaults();
      expect(defaults.status).toBe('lead');
      expect(defaults.leadScore).toBe(0);
      expect(defaults.lastContact).toBeNull();
    });
  });

  describe('row mapping', () => {
    it('should map a contact to a row and back', () => {
      const contact: Contact = {
        ...contactDefaults(),
        id: 'c-1',
        name: 'Jane Smith',
        email: 'jane@example.com',
        tags: ['vip'],
        leadScore: 12,
        createdAt: '2025-01-01T00:00:00.000Z',
      };

      const row = contactToRow(contact);
      expect(row.tags).toBe('["vip"]');
      expect(row.lead_score).toBe(12);
      expect(rowToContact(row)).toEqual(contact);
    });
  });
});
