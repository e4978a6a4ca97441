/**
 * Canonical pair key: "eth/usdc " and "ETH/USDC" name the same pair.
 */
export const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();
