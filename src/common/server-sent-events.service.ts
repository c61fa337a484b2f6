import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import {
	ASSET_BORROWED_ID,
	ASSET_REPAID_ID,
	type AssetBorrowed,
	type AssetRepaid,
	COLLATERAL_ADDED_ID,
	COLLATERAL_WITHDRAWN_ID,
	type CollateralAdded,
	type CollateralWithdrawn,
	POSITION_LIQUIDATED_ID,
	PRICE_UPDATED_ID,
	type PositionLiquidated,
	type PriceUpdated,
} from "./ledger.event";

export type LedgerSse =
	| { type: "position_updated"; account: string }
	| { type: "position_liquidated"; account: string; liquidator: string }
	| { type: "price_updated"; price: string };

export type SseEvent<T = LedgerSse> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<LedgerSse>();

	/**
	 * All events, or only those touching `account` (as position owner or liquidator).
	 * Price updates are always included since they move every ratio.
	 */
	ledgerEvents(account?: string) {
		if (account) {
			return this.events$.pipe(
				filter(
					(e) =>
						e.type === "price_updated" ||
						e.account === account ||
						(e.type === "position_liquidated" && e.liquidator === account),
				),
			);
		}
		return this.events$.asObservable();
	}

	@OnEvent(COLLATERAL_ADDED_ID)
	onCollateralAdded(evt: CollateralAdded) {
		this.events$.next({ type: "position_updated", account: evt.account });
	}

	@OnEvent(COLLATERAL_WITHDRAWN_ID)
	onCollateralWithdrawn(evt: CollateralWithdrawn) {
		this.events$.next({ type: "position_updated", account: evt.account });
	}

	@OnEvent(ASSET_BORROWED_ID)
	onBorrowed(evt: AssetBorrowed) {
		this.events$.next({ type: "position_updated", account: evt.account });
	}

	@OnEvent(ASSET_REPAID_ID)
	onRepaid(evt: AssetRepaid) {
		this.events$.next({ type: "position_updated", account: evt.account });
	}

	@OnEvent(POSITION_LIQUIDATED_ID)
	onLiquidated(evt: PositionLiquidated) {
		this.events$.next({
			type: "position_liquidated",
			account: evt.account,
			liquidator: evt.liquidator,
		});
	}

	@OnEvent(PRICE_UPDATED_ID)
	onPriceUpdated(evt: PriceUpdated) {
		this.events$.next({ type: "price_updated", price: evt.price.toString() });
	}
}
