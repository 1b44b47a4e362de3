import { Decimal } from 'decimal.js';

const CURRENCY_SYMBOLS: Record<string, string> = {
    USD: '$',
    EUR: '€',
    RUB: '₽',
    GBP: '£',
};

function groupThousands(integer: string, separator: string): string {
    return integer.replace(/\B(?=(\d{3})+(?!\d))/g, separator);
}

function withGrouping(value: Decimal, decimals: number, separator: string): string {
    const [integer, fraction] = value.toFixed(decimals, Decimal.ROUND_HALF_UP).split('.');
    const grouped = groupThousands(integer, separator);
    return fraction === undefined ? grouped : `${grouped}.${fraction}`;
}

/**
 * Format a money amount for display.
 *
 * UZS      50000   -> "50 000 so'm"
 * USD      1234.5  -> "$1,234.50"
 * other    1234.5  -> "1,234.50 KZT"
 */
export function formatAmount(amount: Decimal.Value, currency: string): string {
    const value = new Decimal(amount);

    if (currency === 'UZS') {
        return `${withGrouping(value, 0, ' ')} so'm`;
    }

    const symbol = CURRENCY_SYMBOLS[currency];
    if (symbol !== undefined) {
        return `${symbol}${withGrouping(value, 2, ',')}`;
    }

    return `${withGrouping(value, 2, ',')} ${currency}`;
}
