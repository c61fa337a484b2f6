export type AccountId = string;

type LedgerEventBase = {
	eventId: string;
	account: AccountId;
	amount: bigint;
	// collateral-to-debt rate read by the operation, 18 decimals
	price: bigint;
	occurredAt: string; // ISO timestamp
};

export const COLLATERAL_ADDED_ID = "ledger.collateral.added";
export type CollateralAdded = LedgerEventBase;

export const COLLATERAL_WITHDRAWN_ID = "ledger.collateral.withdrawn";
export type CollateralWithdrawn = LedgerEventBase;

export const ASSET_BORROWED_ID = "ledger.borrowed";
export type AssetBorrowed = LedgerEventBase;

export const ASSET_REPAID_ID = "ledger.repaid";
export type AssetRepaid = LedgerEventBase;

export const POSITION_LIQUIDATED_ID = "ledger.liquidated";
export type PositionLiquidated = LedgerEventBase & {
	liquidator: AccountId;
	// collateral sent to the liquidator; `amount` is the debt repaid
	payout: bigint;
};

export const PRICE_UPDATED_ID = "oracle.price.updated";
export type PriceUpdated = {
	eventId: string;
	previous: bigint;
	price: bigint;
	updatedAt: string;
};
