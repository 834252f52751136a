import { Command } from 'commander';
import { CRM } from '../../crm/index.js';
import { formatCurrency, formatPercent, sectionHeader } from '../../utils/format.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEMO CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════════

export type LineWriter = (line: string) => void;

const CSV_PREVIEW_CHARS = 200;

/**
 * Walk through a sample sales cycle against the given CRM and print
 * each step. Intended for an empty database.
 */
export function runDemo(crm: CRM, write: LineWriter): void {
  const { service, analytics, exporter } = crm;

  write(sectionHeader('Adding Contacts'));
  const alice = service.addContact({
    name: 'Alice Johnson',
    email: 'alice@acme.example',
    company: 'Acme Corp',
    title: 'VP Sales',
    source: 'linkedin',
    tags: ['enterprise'],
  });
  const bob = service.addContact({
    name: 'Bob Smith',
    email: 'bob@startup.example',
    company: 'StartupCo',
    title: 'CTO',
    source: 'referral',
    tags: ['startup', 'tech'],
  });
  const carol = service.addContact({
    name: 'Carol Williams',
    email: 'carol@bigco.example',
    company: 'BigCo',
    title: 'Director',
    source: 'cold_outreach',
    tags: ['enterprise'],
  });
  write(`  Added: ${alice.name}, ${bob.name}, ${carol.name}`);

  write(sectionHeader('Lead Scoring'));
  write(`  Alice lead score: ${service.updateLeadScore(alice.id, 45)}`);
  write(`  Bob lead score:   ${service.updateLeadScore(bob.id, 30)}`);

  write(sectionHeader('Creating Deals'));
  const d1 = service.createDeal({
    contactId: alice.id,
    title: 'Enterprise License Q1',
    value: 150_000,
    stage: 'qualified',
    closeDate: '2025-03-31',
  });
  const d2 = service.createDeal({
    contactId: bob.id,
    title: 'SaaS Subscription',
    value: 24_000,
    stage: 'proposal',
    closeDate: '2025-02-28',
  });
  const d3 = service.createDeal({
    contactId: carol.id,
    title: 'Consulting Project',
    value: 45_000,
    stage: 'negotiation',
  });
  write(`  Deals created: ${d1.title}, ${d2.title}, ${d3.title}`);

  write(sectionHeader('Advancing Deals'));
  service.advanceDeal(d1.id, 'negotiation');
  service.advanceDeal(d2.id, 'closed_won');
  write('  Deal 1 → Negotiation, Deal 2 → Closed Won');

  write(sectionHeader('Logging Activities'));
  service.logActivity({
    contactId: alice.id,
    type: 'call',
    summary: 'Discovery call',
    outcome: 'Interested in Q2 deal',
    nextAction: 'Send proposal',
  });
  service.logActivity({
    contactId: bob.id,
    type: 'demo',
    summary: 'Product demo',
    outcome: 'Very positive',
    nextAction: 'Follow-up next week',
  });
  service.logActivity({
    contactId: carol.id,
    type: 'email',
    summary: 'Intro email',
    outcome: 'Awaiting response',
  });
  write('  Activities logged');

  write(sectionHeader('Pipeline Value'));
  const pipeline = analytics.pipelineValue();
  write(`  Total pipeline:    ${formatCurrency(pipeline.totalPipeline)}`);
  write(`  Weighted pipeline: ${formatCurrency(pipeline.weightedPipeline)}`);
  for (const [stage, totals] of Object.entries(pipeline.byStage)) {
    if (totals.count === 0) continue;
    write(`    ${stage}: ${formatCurrency(totals.total)} (${totals.count} deals)`);
  }

  write(sectionHeader('Conversion Funnel'));
  const funnel = analytics.conversionFunnel();
  write(`  Total contacts: ${funnel.totalContacts}`);
  write(`  Lead → Prospect rate: ${formatPercent(funnel.leadToProspectRate)}`);
  write(`  Overall conversion:   ${formatPercent(funnel.overallConversionRate)}`);

  write(sectionHeader(`CSV Export (first ${CSV_PREVIEW_CHARS} chars)`));
  write(exporter.exportContacts('csv').slice(0, CSV_PREVIEW_CHARS));
}

export function registerDemoCommand(program: Command): void {
  program
    .command('demo')
    .description('Run a sample sales cycle and print the resulting analytics')
    .option('--db <path>', 'SQLite file to use', ':memory:')
    .action((options: { db: string }) => {
      const crm = new CRM({ dbPath: options.db });
      try {
        runDemo(crm, (line) => process.stdout.write(`${line}\n`));
        process.stdout.write('\nDemo complete\n');
      } finally {
        crm.close();
      }
    });
}
