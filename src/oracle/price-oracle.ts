import { LedgerException } from "../common/errors";

export const PRICE_ORACLE = Symbol("PRICE_ORACLE");

/** Fixed-point scale of oracle prices (18 decimals). */
export const PRICE_SCALE = 10n ** 18n;

export interface PriceOracle {
	/**
	 * Debt-asset units per collateral unit, scaled by {@link PRICE_SCALE}.
	 * Rejects when the price cannot be read.
	 */
	currentPrice(): Promise<bigint>;
}

export async function readPrice(oracle: PriceOracle): Promise<bigint> {
	try {
		return await oracle.currentPrice();
	} catch (cause) {
		throw new LedgerException("OracleUnavailable", "Price oracle is unavailable", {
			cause,
		});
	}
}
