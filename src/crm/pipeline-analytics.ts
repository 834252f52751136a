/**
 * Pipeline Analytics — read-only aggregates over deals, contacts, activities
 *
 * Every call queries the store directly; nothing is cached, so results
 * always reflect the last committed write.
 *
 * Money is rounded to 2 decimals and ratios to 3. A ratio whose
 * denominator is zero is reported as 0.
 */

import { z } from 'zod';
import type { CRMStore } from './crm-store.js';
import {
  ActivityType,
  ContactStatus,
  DealStage,
  DealStageSchema,
  rowToContact,
  type Contact,
} from './entities.js';
import { InvalidValueError } from './errors.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface StageTotals {
  total: number;
  weighted: number;
  count: number;
}

export interface PipelineValue {
  byStage: Record<DealStage, StageTotals>;
  totalPipeline: number;
  weightedPipeline: number;
}

export interface ConversionFunnel {
  totalContacts: number;
  lead: number;
  prospect: number;
  customer: number;
  churned: number;
  leadToProspectRate: number;
  prospectToCustomerRate: number;
  overallConversionRate: number;
}

export interface WinRate {
  closedWon: number;
  closedLost: number;
  winRate: number;
}

export type ActivitySummary = Record<ActivityType, number>;

// ─── Constants ──────────────────────────────────────────────────────────────

const DEFAULT_TOP_LIMIT = 10;

const STAGE_TOTALS_SQL = `
  SELECT stage,
         SUM(value) AS total,
         SUM(value * probability) AS weighted,
         COUNT(*) AS count
  FROM deals
  GROUP BY stage
`;

const StageTotalsRowSchema = z.object({
  stage: z.string(),
  total: z.number(),
  weighted: z.number(),
  count: z.number().int(),
});

// ─── Helpers ────────────────────────────────────────────────────────────────

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : round(numerator / denominator, 3);
}

// ─── PipelineAnalytics ──────────────────────────────────────────────────────

export class PipelineAnalytics {
  constructor(private readonly store: CRMStore) {}

  /**
   * Total and probability-weighted deal value per stage, plus grand totals.
   * Weighting uses each deal's stored probability, overrides included.
   */
  pipelineValue(): PipelineValue {
    const byStage: Record<DealStage, StageTotals> = {
      prospecting: { total: 0, weighted: 0, count: 0 },
      qualified: { total: 0, weighted: 0, count: 0 },
      proposal: { total: 0, weighted: 0, count: 0 },
      negotiation: { total: 0, weighted: 0, count: 0 },
      closed_won: { total: 0, weighted: 0, count: 0 },
      closed_lost: { total: 0, weighted: 0, count: 0 },
    };

    let totalPipeline = 0;
    let weightedPipeline = 0;

    for (const raw of this.store.query(STAGE_TOTALS_SQL)) {
      const row = StageTotalsRowSchema.parse(raw);
      const stage = DealStageSchema.safeParse(row.stage);
      if (!stage.success) continue;

      byStage[stage.data] = {
        total: round(row.total, 2),
        weighted: round(row.weighted, 2),
        count: row.count,
      };
      totalPipeline += row.total;
      weightedPipeline += row.weighted;
    }

    return {
      byStage,
      totalPipeline: round(totalPipeline, 2),
      weightedPipeline: round(weightedPipeline, 2),
    };
  }

  /**
   * Contact counts per status and the lead → prospect → customer ratios.
   */
  conversionFunnel(): ConversionFunnel {
    const counts = this.store.groupCount('contacts', 'status');
    const lead = counts.get(ContactStatus.LEAD) ?? 0;
    const prospect = counts.get(ContactStatus.PROSPECT) ?? 0;
    const customer = counts.get(ContactStatus.CUSTOMER) ?? 0;
    const churned = counts.get(ContactStatus.CHURNED) ?? 0;
    const totalContacts = lead + prospect + customer + churned;

    return {
      totalContacts,
      lead,
      prospect,
      customer,
      churned,
      leadToProspectRate: ratio(prospect, lead),
      prospectToCustomerRate: ratio(customer, prospect),
      overallConversionRate: ratio(customer, totalContacts),
    };
  }

  dealWinRate(): WinRate {
    const closedWon = this.store.count('deals', { stage: DealStage.CLOSED_WON });
    const closedLost = this.store.count('deals', { stage: DealStage.CLOSED_LOST });

    return {
      closedWon,
      closedLost,
      winRate: ratio(closedWon, closedWon + closedLost),
    };
  }

  /**
   * Highest lead scores first. Ties go to the earlier contact, then by id.
   */
  topContactsByScore(limit: number = DEFAULT_TOP_LIMIT): Contact[] {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidValueError('limit', limit, 'must be a positive integer');
    }

    return this.store
      .findWhere('contacts', {}, {
        orderBy: [
          { column: 'lead_score', direction: 'DESC' },
          { column: 'created_at', direction: 'ASC' },
          { column: 'id', direction: 'ASC' },
        ],
        limit,
      })
      .map(rowToContact);
  }

  /**
   * Activity counts per type; types with no activity report 0.
   */
  activitySummary(): ActivitySummary {
    const counts = this.store.groupCount('activities', 'type');
    return {
      call: counts.get(ActivityType.CALL) ?? 0,
      email: counts.get(ActivityType.EMAIL) ?? 0,
      meeting: counts.get(ActivityType.MEETING) ?? 0,
      demo: counts.get(ActivityType.DEMO) ?? 0,
      follow_up: counts.get(ActivityType.FOLLOW_UP) ?? 0,
    };
  }
}
