export const RAO_PER_TAO = 1_000_000_000n;

/**
 * Render a rao amount as TAO with all nine decimals, e.g. τ1.500000000
 */
export function formatTao(rao: bigint): string {
  const sign = rao < 0n ? '-' : '';
  const abs = rao < 0n ? -rao : rao;
  const whole = abs / RAO_PER_TAO;
  const fraction = (abs % RAO_PER_TAO).toString().padStart(9, '0');
  return `${sign}τ${whole}.${fraction}`;
}
