/**
 * CRM
 *
 * Barrel export for the CRM system:
 * - CRM: facade owning one store handle
 * - CRMStore: SQLite-backed record tables
 * - CRMService: contact, deal and activity rules
 * - PipelineAnalytics: pipeline, funnel, win rate, top contacts, activity mix
 * - RecordExporter: CSV / JSON export
 */

export { CRM, type CRMOptions } from './crm.js';
export { CRMStore, type RowFilter, type RowChanges, type FindOptions, type OrderBy } from './crm-store.js';
export {
  CRMService,
  type AddContactInput,
  type ContactFilter,
  type ContactPatch,
  type CreateDealInput,
  type DealFilter,
  type DealPatch,
  type LogActivityInput,
  type ContactStatusInput,
  type DealStageInput,
  type ActivityTypeInput,
} from './crm-service.js';
export {
  PipelineAnalytics,
  type PipelineValue,
  type StageTotals,
  type ConversionFunnel,
  type WinRate,
  type ActivitySummary,
} from './pipeline-analytics.js';
export { RecordExporter, parseExportFormat, toCsv, type ExportFormat } from './record-exporter.js';
export {
  ActivityType,
  ContactStatus,
  DealStage,
  STAGE_PROBABILITY,
  decodeTags,
  encodeTags,
  parseActivityType,
  parseContactStatus,
  parseDealStage,
  type Activity,
  type Contact,
  type Deal,
} from './entities.js';
export { CRMError, DuplicateEmailError, InvalidValueError, NotFoundError, type EntityKind } from './errors.js';
