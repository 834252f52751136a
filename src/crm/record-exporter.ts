/**
 * Record Exporter — CSV and JSON snapshots of contacts and deals
 *
 * Field names and order follow the stored column layout. In CSV, tags
 * are joined with '|' and nulls become empty fields; in JSON, tags stay
 * an array and nulls stay null.
 */

import type { CRMService } from './crm-service.js';
import { contactToRow, dealToRow } from './entities.js';
import { InvalidValueError } from './errors.js';
import { TABLE_COLUMNS } from './schema.js';

export type ExportFormat = 'csv' | 'json';

const TAG_DELIMITER = '|';

type Cell = string | number | null;

export function parseExportFormat(input: string): ExportFormat {
  if (input === 'csv' || input === 'json') return input;
  throw new InvalidValueError('format', input, "expected 'csv' or 'json'");
}

// ─── CSV ────────────────────────────────────────────────────────────────────

function escapeCsvCell(cell: Cell): string {
  if (cell === null) return '';
  const text = String(cell);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(header: readonly string[], records: ReadonlyArray<readonly Cell[]>): string {
  const lines = [header, ...records].map((cells) => cells.map(escapeCsvCell).join(','));
  return `${lines.join('\n')}\n`;
}

// ─── RecordExporter ─────────────────────────────────────────────────────────

export class RecordExporter {
  constructor(private readonly service: CRMService) {}

  exportContacts(format: ExportFormat = 'csv'): string {
    const contacts = this.service.listContacts();
    const columns = TABLE_COLUMNS.contacts;

    switch (parseExportFormat(format)) {
      case 'json':
        return JSON.stringify(
          contacts.map((contact) => ({ ...contactToRow(contact), tags: contact.tags })),
          null,
          2,
        );
      case 'csv':
        return toCsv(
          columns,
          contacts.map((contact) => {
            const row = { ...contactToRow(contact), tags: contact.tags.join(TAG_DELIMITER) };
            return columns.map((column) => row[column]);
          }),
        );
    }
  }

  exportDeals(format: ExportFormat = 'csv'): string {
    const rows = this.service.listDeals().map(dealToRow);
    const columns = TABLE_COLUMNS.deals;

    switch (parseExportFormat(format)) {
      case 'json':
        return JSON.stringify(rows, null, 2);
      case 'csv':
        return toCsv(
          columns,
          rows.map((row) => columns.map((column) => row[column])),
        );
    }
  }
}
