/**
 * Text formatting utilities
 */

const SECTION_WIDTH = 60;

const moneyFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Dollar amount with thousands separators and cents: 150000 → "$150,000.00".
 */
export function formatCurrency(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  return `${sign}$${moneyFormat.format(Math.abs(amount))}`;
}

/**
 * Ratio as a percentage with one decimal: 0.5 → "50.0%".
 */
export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

/**
 * Three-line banner used between CLI report sections.
 */
export function sectionHeader(title: string): string {
  const rule = '='.repeat(SECTION_WIDTH);
  return `\n${rule}\n  ${title}\n${rule}`;
}
