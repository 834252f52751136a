/**
 * CRM — one store handle with the service, analytics and exporter on top
 *
 * Each instance opens and owns its own connection; there is no shared
 * process-wide handle. Call close() when done.
 *
 * Usage:
 *   const crm = new CRM({ dbPath: ':memory:' });
 *   crm.service.addContact({ name: 'Jane', email: 'jane@example.com' });
 *   const pipeline = crm.analytics.pipelineValue();
 *   crm.close();
 */

import { getConfig, getDatabasePath } from '../config/config.js';
import { CRMService } from './crm-service.js';
import { CRMStore } from './crm-store.js';
import { PipelineAnalytics } from './pipeline-analytics.js';
import { RecordExporter } from './record-exporter.js';

export interface CRMOptions {
  /** SQLite file path or ':memory:'. Defaults to the configured database file. */
  dbPath?: string;
}

export class CRM {
  readonly service: CRMService;
  readonly analytics: PipelineAnalytics;
  readonly exporter: RecordExporter;
  private readonly store: CRMStore;

  constructor(options: CRMOptions = {}) {
    this.store = new CRMStore(options.dbPath ?? getDatabasePath(getConfig()));
    this.store.init();

    this.service = new CRMService(this.store);
    this.analytics = new PipelineAnalytics(this.store);
    this.exporter = new RecordExporter(this.service);
  }

  isOpen(): boolean {
    return this.store.isOpen();
  }

  close(): void {
    this.store.close();
  }
}
