/**
 * Position math on integer base units. Every division floors.
 *
 * - collateralValue = collateral * price / SCALE
 * - ratio = collateralValue * 100 / debt          (MAX_RATIO when debt is zero)
 * - liquidatable when ratio < MIN_COLLATERAL_RATIO
 * - liquidation payout = min(portion + portion * bonus / 100, collateral)
 *   where portion = debt * collateral / collateralValue
 */

import { PRICE_SCALE } from "../oracle/price-oracle";

export const MIN_COLLATERAL_RATIO = 120n;
export const LIQUIDATION_BONUS_PCT = 10n;
/** Ratio of a position without debt. */
export const MAX_RATIO = 2n ** 256n - 1n;

export type Balances = {
	collateral: bigint;
	debt: bigint;
};

export const ZERO_BALANCES: Readonly<Balances> = { collateral: 0n, debt: 0n };

export function collateralValue(collateral: bigint, price: bigint): bigint {
	return (collateral * price) / PRICE_SCALE;
}

export function positionRatio(balances: Balances, price: bigint): bigint {
	if (balances.debt === 0n) {
		return MAX_RATIO;
	}
	return (collateralValue(balances.collateral, price) * 100n) / balances.debt;
}

export function isLiquidatable(balances: Balances, price: bigint): boolean {
	return positionRatio(balances, price) < MIN_COLLATERAL_RATIO;
}

/** Largest total debt `collateral` can back at `price`. */
export function maxBorrowAmount(collateral: bigint, price: bigint): bigint {
	if (collateral === 0n) {
		return 0n;
	}
	return (collateralValue(collateral, price) * 100n) / MIN_COLLATERAL_RATIO;
}

/**
 * Collateral that could be withdrawn while keeping the debt covered.
 * An estimate: the withdrawal itself is still checked.
 */
export function maxWithdrawableCollateral(
	balances: Balances,
	price: bigint,
): bigint {
	if (balances.debt === 0n) {
		return balances.collateral;
	}
	const maxDebt = maxBorrowAmount(balances.collateral, price);
	if (price === 0n || balances.debt >= maxDebt) {
		return 0n;
	}
	const headroom = ((maxDebt - balances.debt) * PRICE_SCALE) / price;
	const withdrawable = (headroom * MIN_COLLATERAL_RATIO) / 100n;
	return withdrawable > balances.collateral
		? balances.collateral
		: withdrawable;
}

export type LiquidationQuote = {
	debtRepaid: bigint;
	collateralPortion: bigint;
	bonus: bigint;
	payout: bigint;
	remainingCollateral: bigint;
};

/**
 * Splits a position for liquidation at `price`.
 * Throws a RangeError when the collateral is worth nothing at that price.
 */
export function quoteLiquidation(
	balances: Balances,
	price: bigint,
): LiquidationQuote {
	const value = collateralValue(balances.collateral, price);
	if (value === 0n) {
		throw new RangeError("Collateral has no value at this price");
	}
	const collateralPortion = (balances.debt * balances.collateral) / value;
	const bonus = (collateralPortion * LIQUIDATION_BONUS_PCT) / 100n;
	const uncapped = collateralPortion + bonus;
	const payout =
		uncapped > balances.collateral ? balances.collateral : uncapped;
	return {
		debtRepaid: balances.debt,
		collateralPortion,
		bonus,
		payout,
		remainingCollateral: balances.collateral - payout,
	};
}
