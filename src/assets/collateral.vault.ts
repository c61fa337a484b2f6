export const COLLATERAL_VAULT = Symbol("COLLATERAL_VAULT");

/**
 * Custody of the native collateral asset. Value attached to a deposit comes in
 * through `receive`, payouts leave through `send`.
 */
export interface CollateralVault {
	receive(from: string, amount: bigint): Promise<boolean>;
	send(to: string, amount: bigint): Promise<boolean>;
	/** Total collateral paid out to `account` so far. */
	paidTo(account: string): Promise<bigint>;
	/** Collateral currently held on behalf of the ledger. */
	custody(): Promise<bigint>;
}
