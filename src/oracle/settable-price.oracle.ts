import { Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import { PRICE_UPDATED_ID, PriceUpdated } from "../common/ledger.event";
import { PriceOracle } from "./price-oracle";

/**
 * Trusted in-process price source. The price only changes through {@link setPrice}.
 */
export class SettablePriceOracle implements PriceOracle {
	private readonly logger = new Logger(SettablePriceOracle.name);
	private price: bigint;

	constructor(
		initialPrice: bigint,
		private readonly events?: EventEmitter2,
	) {
		if (initialPrice < 0n) {
			throw new Error("Oracle price cannot be negative");
		}
		this.price = initialPrice;
	}

	async currentPrice(): Promise<bigint> {
		return this.price;
	}

	setPrice(price: bigint): void {
		if (price < 0n) {
			throw new Error("Oracle price cannot be negative");
		}
		const previous = this.price;
		this.price = price;
		this.logger.log(`Price updated ${previous} -> ${price}`);
		this.events?.emit(PRICE_UPDATED_ID, {
			eventId: nanoid(4),
			previous,
			price,
			updatedAt: new Date().toISOString(),
		} satisfies PriceUpdated);
	}
}
