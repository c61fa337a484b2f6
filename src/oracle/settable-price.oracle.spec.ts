import { EventEmitter2 } from "@nestjs/event-emitter";
import { isLedgerException } from "../common/errors";
import { PRICE_UPDATED_ID } from "../common/ledger.event";
import { readPrice } from "./price-oracle";
import { SettablePriceOracle } from "./settable-price.oracle";

describe("SettablePriceOracle", () => {
	it("returns the initial price until it is set", async () => {
		const oracle = new SettablePriceOracle(2000n);
		expect(await oracle.currentPrice()).toBe(2000n);

		oracle.setPrice(1500n);
		expect(await oracle.currentPrice()).toBe(1500n);
	});

	it("accepts a zero price and rejects negative ones", () => {
		expect(() => new SettablePriceOracle(-1n)).toThrow(
			"Oracle price cannot be negative",
		);
		const oracle = new SettablePriceOracle(1n);
		expect(() => oracle.setPrice(0n)).not.toThrow();
		expect(() => oracle.setPrice(-1n)).toThrow("Oracle price cannot be negative");
	});

	it("emits the price change", () => {
		const events = new EventEmitter2();
		const emit = jest.spyOn(events, "emit");
		const oracle = new SettablePriceOracle(2000n, events);

		oracle.setPrice(1500n);

		expect(emit).toHaveBeenCalledWith(
			PRICE_UPDATED_ID,
			expect.objectContaining({ previous: 2000n, price: 1500n }),
		);
	});
});

describe("readPrice", () => {
	it("reports a failing oracle as OracleUnavailable", async () => {
		const broken = {
			currentPrice: jest.fn().mockRejectedValue(new Error("feed down")),
		};

		const err: unknown = await readPrice(broken).catch((e: unknown) => e);

		expect(isLedgerException(err, "OracleUnavailable")).toBe(true);
	});
});
