import { Command } from 'commander';
import { CRM, parseExportFormat } from '../../crm/index.js';
import { cliLogger, formatError } from '../../utils/logger.js';
import { formatCurrency, formatPercent } from '../../utils/format.js';

// ═══════════════════════════════════════════════════════════════════════════════
// REPORT & EXPORT CLI COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

interface DbOption {
  db?: string;
}

function withCRM(options: DbOption, fn: (crm: CRM) => void): void {
  let crm: CRM | null = null;
  try {
    crm = new CRM({ dbPath: options.db });
    fn(crm);
  } catch (error) {
    cliLogger.error({ error: formatError(error) }, 'Command failed');
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Error: ${message}\n`);
    process.exitCode = 1;
  } finally {
    crm?.close();
  }
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function registerReportCommands(program: Command): void {
  // ── pipeline ───────────────────────────────────────────────────────

  program
    .command('pipeline')
    .description('Total and weighted pipeline value by stage')
    .option('--db <path>', 'SQLite file (default: configured database)')
    .option('--json', 'Output as JSON')
    .action((options: DbOption & { json?: boolean }) => {
      withCRM(options, (crm) => {
        const pipeline = crm.analytics.pipelineValue();
        if (options.json) {
          print(JSON.stringify(pipeline, null, 2));
          return;
        }
        print(`Total pipeline:    ${formatCurrency(pipeline.totalPipeline)}`);
        print(`Weighted pipeline: ${formatCurrency(pipeline.weightedPipeline)}`);
        for (const [stage, totals] of Object.entries(pipeline.byStage)) {
          print(
            `  ${stage.padEnd(12)} ${formatCurrency(totals.total).padStart(16)}  weighted ${formatCurrency(totals.weighted)}  (${totals.count} deals)`,
          );
        }
      });
    });

  // ── funnel ─────────────────────────────────────────────────────────

  program
    .command('funnel')
    .description('Contact conversion funnel')
    .option('--db <path>', 'SQLite file (default: configured database)')
    .action((options: DbOption) => {
      withCRM(options, (crm) => {
        const funnel = crm.analytics.conversionFunnel();
        print(`Total contacts: ${funnel.totalContacts}`);
        print(`  lead ${funnel.lead} / prospect ${funnel.prospect} / customer ${funnel.customer} / churned ${funnel.churned}`);
        print(`Lead → Prospect:     ${formatPercent(funnel.leadToProspectRate)}`);
        print(`Prospect → Customer: ${formatPercent(funnel.prospectToCustomerRate)}`);
        print(`Overall conversion:  ${formatPercent(funnel.overallConversionRate)}`);
      });
    });

  // ── win-rate ───────────────────────────────────────────────────────

  program
    .command('win-rate')
    .description('Closed-won vs closed-lost deals')
    .option('--db <path>', 'SQLite file (default: configured database)')
    .action((options: DbOption) => {
      withCRM(options, (crm) => {
        const rate = crm.analytics.dealWinRate();
        print(`Won ${rate.closedWon}, lost ${rate.closedLost}, win rate ${formatPercent(rate.winRate)}`);
      });
    });

  // ── top ────────────────────────────────────────────────────────────

  program
    .command('top')
    .description('Contacts with the highest lead score')
    .option('-n, --limit <count>', 'Number of contacts', '10')
    .option('--db <path>', 'SQLite file (default: configured database)')
    .action((options: DbOption & { limit: string }) => {
      withCRM(options, (crm) => {
        const contacts = crm.analytics.topContactsByScore(parseInt(options.limit, 10));
        if (contacts.length === 0) {
          print('No contacts found.');
          return;
        }
        for (const c of contacts) {
          print(`${String(c.leadScore).padStart(4)}  ${c.name} <${c.email}>${c.company ? ` @ ${c.company}` : ''}`);
        }
      });
    });

  // ── activities ─────────────────────────────────────────────────────

  program
    .command('activities')
    .description('Activity counts by type')
    .option('--db <path>', 'SQLite file (default: configured database)')
    .action((options: DbOption) => {
      withCRM(options, (crm) => {
        for (const [type, count] of Object.entries(crm.analytics.activitySummary())) {
          print(`  ${type.padEnd(10)} ${count}`);
        }
      });
    });

  // ── export ─────────────────────────────────────────────────────────

  program
    .command('export')
    .description('Export contacts or deals')
    .argument('<entity>', 'contacts | deals')
    .option('-f, --format <format>', 'csv | json', 'csv')
    .option('--db <path>', 'SQLite file (default: configured database)')
    .action((entity: string, options: DbOption & { format: string }) => {
      withCRM(options, (crm) => {
        const format = parseExportFormat(options.format);
        if (entity === 'contacts') {
          process.stdout.write(crm.exporter.exportContacts(format));
        } else if (entity === 'deals') {
          process.stdout.write(crm.exporter.exportDeals(format));
        } else {
          throw new Error(`Unknown entity '${entity}'. Expected contacts or deals.`);
        }
      });
    });
}
