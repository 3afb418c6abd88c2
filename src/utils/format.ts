// ═══════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════

/**
 * Format an integer with thousands separators
 */
export function formatCount(value: number): string {
  return Math.trunc(value).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Signed change between two counts, e.g. "+1,200" or "-35"
 */
export function formatDelta(previous: number, current: number): string {
  const delta = current - previous;
  if (delta === 0) return '0';
  return `${delta > 0 ? '+' : '-'}${formatCount(Math.abs(delta))}`;
}
