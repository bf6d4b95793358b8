const symbols: Record<string, string> = {
  IDR: 'Rp',
  USD: '$',
  EUR: '€',
};

export const formatAmount = (amount: number, options: { locale: string; currency: string }): string => {
  const grouped = new Intl.NumberFormat(options.locale, { maximumFractionDigits: 2 }).format(Math.abs(amount));
  const symbol = symbols[options.currency.toUpperCase()] ?? options.currency.toUpperCase();
  return `${amount < 0 ? '-' : ''}${symbol} ${grouped}`;
};
