export const DEBT_ASSET_LEDGER = Symbol("DEBT_ASSET_LEDGER");

/** Allowance that is never decremented by `transferFrom`. */
export const UNLIMITED_ALLOWANCE = 2n ** 256n - 1n;

/**
 * Token ledger of the borrowed asset. Transfers report failure with `false`
 * and leave balances untouched when they do.
 */
export interface DebtAssetLedger {
	readonly symbol: string;
	balanceOf(account: string): Promise<bigint>;
	allowance(owner: string, spender: string): Promise<bigint>;
	approve(owner: string, spender: string, amount: bigint): Promise<boolean>;
	transfer(from: string, to: string, amount: bigint): Promise<boolean>;
	transferFrom(
		spender: string,
		from: string,
		to: string,
		amount: bigint,
	): Promise<boolean>;
}
