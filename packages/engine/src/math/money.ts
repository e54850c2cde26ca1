import Decimal from 'decimal.js';

interface CurrencyConfig {
  symbol: string;
  position: 'prefix' | 'suffix';
}

const CURRENCY_CONFIG: Record<string, CurrencyConfig> = {
  USD: { symbol: '$', position: 'prefix' },
  CAD: { symbol: 'CA$', position: 'prefix' },
  GBP: { symbol: '£', position: 'prefix' },
  EUR: { symbol: '€', position: 'suffix' },
};

export function roundHalfUp(value: Decimal.Value): number {
  return new Decimal(value).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toNumber();
}

export function formatMoney(amountCents: number, currency = 'USD'): string {
  const abs = new Decimal(amountCents).abs().dividedBy(100).toFixed(2);
  const isNegative = amountCents < 0;
  const [whole, fraction] = abs.split('.');
  const grouped = `${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;

  const config = CURRENCY_CONFIG[currency];

  if (config) {
    if (config.position === 'prefix') {
      return `${isNegative ? '-' : ''}${config.symbol}${grouped}`;
    }
    return `${isNegative ? '-' : ''}${grouped} ${config.symbol}`;
  }

  // Unknown currency: fallback to suffix with ISO code
  return `${isNegative ? '-' : ''}${grouped} ${currency}`;
}

/** Plain decimal rendering for CSV cells: 46027 → "460.27". */
export function centsToDecimalString(amountCents: number): string {
  return new Decimal(amountCents).dividedBy(100).toFixed(2);
}

export function addCents(...amounts: number[]): number {
  return amounts.reduce((acc, val) => new Decimal(acc).plus(val).toNumber(), 0);
}

export function subtractCents(a: number, b: number): number {
  return new Decimal(a).minus(b).toNumber();
}

export function percentOfCents(amount: number, percent: Decimal.Value): number {
  return roundHalfUp(new Decimal(amount).times(percent).dividedBy(100));
}

export function sumCents(amounts: number[]): number {
  return amounts.reduce((acc, val) => new Decimal(acc).plus(val).toNumber(), 0);
}
