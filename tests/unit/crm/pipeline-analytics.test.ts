import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CRMStore } from '../../../src/crm/crm-store.js';
import { CRMService } from '../../../src/crm/crm-service.js';
import { PipelineAnalytics } from '../../../src/crm/pipeline-analytics.js';
import { InvalidValueError } from '../../../src/crm/errors.js';

describe('PipelineAnalytics', () => {
  let store: CRMStore;
  let service: CRMService;
  let analytics: PipelineAnalytics;

  beforeEach(() => {
    store = new CRMStore(':memory:');
    store.init();
    service = new CRMService(store);
    analytics = new PipelineAnalytics(store);
  });

  afterEach(() => {
    vi.useRealTimers();
    store.close();
  });

  describe('pipelineValue', () => {
    it('should report zeros for every stage on an empty store', () => {
      const pipeline = analytics.pipelineValue();

      expect(pipeline.totalPipeline).toBe(0);
      expect(pipeline.weightedPipeline).toBe(0);
      expect(Object.keys(pipeline.byStage)).toEqual([
        'prospecting',
        'qualified',
        'proposal',
        'negotiation',
        'closed_won',
        'closed_lost',
      ]);
      expect(pipeline.byStage.negotiation).toEqual({ total: 0, weighted: 0, count: 0 });
    });

    it('should sum values and weight them by stored probability', () => {
      const contact = service.addContact({ name: 'Jane', email: 'jane@example.com' });
      service.createDeal({ contactId: contact.id, title: 'A', value: 100_000 });
      service.createDeal({ contactId: contact.id, title: 'B', value: 50_000, stage: 'closed_won' });

      const pipeline = analytics.pipelineValue();

      expect(pipeline.totalPipeline).toBe(150_000);
      expect(pipeline.weightedPipeline).toBe(60_000);
      expect(pipeline.byStage.prospecting).toEqual({ total: 100_000, weighted: 10_000, count: 1 });
      expect(pipeline.byStage.closed_won).toEqual({ total: 50_000, weighted: 50_000, count: 1 });
    });

    it('should weight by an overridden probability', () => {
      const contact = service.addContact({ name: 'Jane', email: 'jane@example.com' });
      const deal = service.createDeal({ contactId: contact.id, title: 'A', value: 10_000, stage: 'proposal' });
      service.updateDeal(deal.id, { probability: 0.9 });

      const pipeline = analytics.pipelineValue();
      expect(pipeline.byStage.proposal.weighted).toBe(9_000);
      expect(pipeline.weightedPipeline).toBe(9_000);
    });

    it('should round money to cents', () => {
      const contact = service.addContact({ name: 'Jane', email: 'jane@example.com' });
      service.createDeal({ contactId: contact.id, title: 'A', value: 333.333, stage: 'qualified' });

      const pipeline = analytics.pipelineValue();
      expect(pipeline.byStage.qualified.total).toBe(333.33);
      expect(pipeline.byStage.qualified.weighted).toBe(83.33);
    });
  });

  describe('conversionFunnel', () => {
    it('should report one lead and one customer as 50% overall', () => {
      service.addContact({ name: 'Lead', email: 'lead@example.com' });
      service.addContact({ name: 'Customer', email: 'customer@example.com', status: 'customer' });

      expect(analytics.conversionFunnel()).toEqual({
        totalContacts: 2,
        lead: 1,
        prospect: 0,
        customer: 1,
        churned: 0,
        leadToProspectRate: 0,
        prospectToCustomerRate: 0,
        overallConversionRate: 0.5,
      });
    });

    it('should round ratios to 3 decimals', () => {
      service.addContact({ name: 'L1', email: 'l1@example.com' });
      service.addContact({ name: 'L2', email: 'l2@example.com' });
      service.addContact({ name: 'L3', email: 'l3@example.com' });
      service.addContact({ name: 'P1', email: 'p1@example.com', status: 'prospect' });
      service.addContact({ name: 'C1', email: 'c1@example.com', status: 'customer' });
      service.addContact({ name: 'X1', email: 'x1@example.com', status: 'churned' });

      const funnel = analytics.conversionFunnel();
      expect(funnel.leadToProspectRate).toBe(0.333);
      expect(funnel.prospectToCustomerRate).toBe(1);
      expect(funnel.overallConversionRate).toBe(0.167);
    });

    it('should report zero ratios on an empty store', () => {
      const funnel = analytics.conversionFunnel();
      expect(funnel.totalContacts).toBe(0);
      expect(funnel.overallConversionRate).toBe(0);
    });
  });

  describe('dealWinRate', () => {
    it('should divide won by closed deals', () => {
      const contact = service.addContact({ name: 'Jane', email: 'jane@example.com' });
      service.createDeal({ contactId: contact.id, title: 'W1', value: 1, stage: 'closed_won' });
      service.createDeal({ contactId: contact.id, title: 'L1', value: 1, stage: 'closed_lost' });
      service.createDeal({ contactId: contact.id, title: 'L2', value: 1, stage: 'closed_lost' });
      service.createDeal({ contactId: contact.id, title: 'Open', value: 1, stage: 'negotiation' });

      expect(analytics.dealWinRate()).toEqual({ closedWon: 1, closedLost: 2, winRate: 0.333 });
    });

    it('should report 0 when nothing is closed', () => {
      expect(analytics.dealWinRate()).toEqual({ closedWon: 0, closedLost: 0, winRate: 0 });
    });
  });

  describe('topContactsByScore', () => {
    it('should order by score, then by creation time', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2025-01-01T00:00:00.000Z'));
      const low = service.addContact({ name: 'Low', email: 'low@example.com' });
      vi.setSystemTime(new Date('2025-01-02T00:00:00.000Z'));
      const early = service.addContact({ name: 'Early', email: 'early@example.com' });
      vi.setSystemTime(new Date('2025-01-03T00:00:00.000Z'));
      const late = service.addContact({ name: 'Late', email: 'late@example.com' });
      vi.setSystemTime(new Date('2025-01-04T00:00:00.000Z'));
      const high = service.addContact({ name: 'High', email: 'high@example.com' });

      service.updateLeadScore(low.id, 5);
      service.updateLeadScore(early.id, 20);
      service.updateLeadScore(late.id, 20);
      service.updateLeadScore(high.id, 90);

      expect(analytics.topContactsByScore().map((c) => c.name)).toEqual(['High', 'Early', 'Late', 'Low']);
    });

    it('should honor the limit', () => {
      for (let i = 0; i < 12; i++) {
        const contact = service.addContact({ name: `C${i}`, email: `c${i}@example.com` });
        service.updateLeadScore(contact.id, i);
      }

      expect(analytics.topContactsByScore()).toHaveLength(10);
      expect(analytics.topContactsByScore(2).map((c) => c.leadScore)).toEqual([11, 10]);
    });

    it('should reject a limit below 1', () => {
      expect(() => analytics.topContactsByScore(0)).toThrow(InvalidValueError);
      expect(() => analytics.topContactsByScore(2.5)).toThrow(InvalidValueError);
    });
  });

  describe('activitySummary', () => {
    it('should count activities per type with zeros for unused types', () => {
      const contact = service.addContact({ name: 'Jane', email: 'jane@example.com' });
      service.logActivity({ contactId: contact.id, type: 'call', summary: 'One' });
      service.logActivity({ contactId: contact.id, type: 'call', summary: 'Two' });
      service.logActivity({ contactId: contact.id, type: 'demo', summary: 'Three' });

      expect(analytics.activitySummary()).toEqual({
        call: 2,
        email: 0,
        meeting: 0,
        demo: 1,
        follow_up: 0,
      });
    });
  });
});
