export function pluralize(word: string, count: number, pluralForm?: string): string {
  if (count === 1) return word;
  if (pluralForm) return pluralForm;

  const lower = word.toLowerCase();
  // “bus” → “buses”, “box” → “boxes”, “buzz” → “buzzes”
  if (['s', 'sh', 'ch', 'x', 'z'].some(end => lower.endsWith(end))) return `${word}es`;

  // default: just add “s”  (“bar” → “bars”)
  return `${word}s`;
}

const priceFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `12345.678` → `$12,345.68` */
export const formatUsd = (value: number) => `$${priceFormatter.format(value)}`;
