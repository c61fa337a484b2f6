import { ForbiddenException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { Test, type TestingModule } from "@nestjs/testing";
import { TypeOrmModule, getRepositoryToken } from "@nestjs/typeorm";
import { Repository } from "typeorm";

import { COLLATERAL_VAULT } from "../assets/collateral.vault";
import { DEBT_ASSET_LEDGER, UNLIMITED_ALLOWANCE } from "../assets/debt-asset.ledger";
import { InMemoryCollateralVault } from "../assets/in-memory-collateral.vault";
import { InMemoryDebtAssetLedger } from "../assets/in-memory-debt-asset.ledger";
import { cursorFromString, emptyCursor } from "../common/dto/envelopes";
import { isLedgerException, type LedgerErrorCode } from "../common/errors";
import {
	ASSET_BORROWED_ID,
	COLLATERAL_ADDED_ID,
	POSITION_LIQUIDATED_ID,
} from "../common/ledger.event";
import { PRICE_ORACLE, PRICE_SCALE } from "../oracle/price-oracle";
import { SettablePriceOracle } from "../oracle/settable-price.oracle";
import { LedgerActivity } from "./ledger-activity.entity";
import { LedgerService } from "./ledger.service";
import { Position } from "./position.entity";
import { isLiquidatable } from "./position-math";

const LEDGER = "ledger";
const RESERVE = 10n ** 30n;
const price = (units: bigint) => units * PRICE_SCALE;

async function failureCode(p: Promise<unknown>): Promise<LedgerErrorCode> {
	const err: unknown = await p.then(
		() => undefined,
		(e: unknown) => e,
	);
	if (!isLedgerException(err)) {
		throw new Error(`Expected a ledger error, got ${String(err)}`);
	}
	return err.code;
}

/** Deterministic PRNG for the randomized runs. */
function mulberry32(seed: number) {
	let a = seed;
	return () => {
		a = (a + 0x6d2b79f5) | 0;
		let t = Math.imul(a ^ (a >>> 15), 1 | a);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

describe("LedgerService", () => {
	let moduleRef: TestingModule;
	let service: LedgerService;
	let oracle: SettablePriceOracle;
	let corn: InMemoryDebtAssetLedger;
	let vault: InMemoryCollateralVault;
	let events: EventEmitter2;
	let activity: Repository<LedgerActivity>;

	beforeEach(async () => {
		oracle = new SettablePriceOracle(price(2000n));
		corn = new InMemoryDebtAssetLedger("CORN", [
			{ account: LEDGER, amount: RESERVE },
		]);
		vault = new InMemoryCollateralVault();
		events = new EventEmitter2();

		moduleRef = await Test.createTestingModule({
			imports: [
				TypeOrmModule.forRoot({
					type: "better-sqlite3",
					database: ":memory:",
					entities: [Position, LedgerActivity],
					synchronize: true,
				}),
				TypeOrmModule.forFeature([Position, LedgerActivity]),
			],
			providers: [
				LedgerService,
				{
					provide: ConfigService,
					useValue: new ConfigService({ LEDGER_ACCOUNT: LEDGER }),
				},
				{ provide: PRICE_ORACLE, useValue: oracle },
				{ provide: DEBT_ASSET_LEDGER, useValue: corn },
				{ provide: COLLATERAL_VAULT, useValue: vault },
				{ provide: EventEmitter2, useValue: events },
			],
		}).compile();
		await moduleRef.init();

		service = moduleRef.get(LedgerService);
		activity = moduleRef.get<Repository<LedgerActivity>>(
			getRepositoryToken(LedgerActivity),
		);
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	/** A liquidator funded from the reserve that approved the ledger for `allowance`. */
	async function fundLiquidator(
		account: string,
		balance: bigint,
		allowance: bigint,
	) {
		await corn.transfer(LEDGER, account, balance);
		await corn.approve(account, LEDGER, allowance);
	}

	async function snapshot(...accounts: string[]) {
		return {
			positions: await Promise.all(accounts.map((a) => service.getBalances(a))),
			corn: await Promise.all(accounts.map((a) => corn.balanceOf(a))),
			allowances: await Promise.all(
				accounts.map((a) => corn.allowance(a, LEDGER)),
			),
			paid: await Promise.all(accounts.map((a) => vault.paidTo(a))),
			custody: await vault.custody(),
			activity: await activity.count(),
		};
	}

	it("grants itself a standing approval on start", async () => {
		expect(await corn.allowance(LEDGER, LEDGER)).toBe(UNLIMITED_ALLOWANCE);
	});

	describe("borrowing against collateral", () => {
		it("lends up to 120% coverage and refuses beyond", async () => {
			await service.addCollateral("alice", 10n);
			expect(await service.calculateCollateralValue("alice")).toBe(20000n);

			await expect(service.borrowCorn("alice", 15000n)).resolves.toEqual({
				collateral: 10n,
				debt: 15000n,
			});
			expect(await service.calculatePositionRatio("alice")).toBe(133n);
			expect(await corn.balanceOf("alice")).toBe(15000n);

			const before = await snapshot("alice");
			expect(await failureCode(service.borrowCorn("alice", 3000n))).toBe(
				"UnsafePositionRatio",
			);
			expect(await snapshot("alice")).toEqual(before);
			expect(await service.getBalances("alice")).toEqual({
				collateral: 10n,
				debt: 15000n,
			});
		});

		it("refuses to borrow without collateral", async () => {
			expect(await failureCode(service.borrowCorn("bob", 1n))).toBe(
				"UnsafePositionRatio",
			);
			expect(await corn.balanceOf("bob")).toBe(0n);
		});

		it("reports BorrowingFailed when the reserve is short", async () => {
			await corn.transfer(LEDGER, "elsewhere", RESERVE);
			await service.addCollateral("alice", 10n);
			const before = await snapshot("alice");

			expect(await failureCode(service.borrowCorn("alice", 100n))).toBe(
				"BorrowingFailed",
			);
			expect(await snapshot("alice")).toEqual(before);
		});

		it("emits after commit", async () => {
			const emit = jest.spyOn(events, "emit");
			await service.addCollateral("alice", 10n);
			await service.borrowCorn("alice", 100n);
			await service.borrowCorn("alice", 100000n).catch(() => undefined);

			expect(emit.mock.calls.map(([id]) => id)).toEqual([
				COLLATERAL_ADDED_ID,
				ASSET_BORROWED_ID,
			]);
		});
	});

	describe("withdrawing collateral", () => {
		beforeEach(async () => {
			await service.addCollateral("alice", 10n);
			await service.borrowCorn("alice", 15000n);
		});

		it("pays out while the position stays safe", async () => {
			// 9 * 2000 = 18000 -> exactly 120%
			await expect(service.withdrawCollateral("alice", 1n)).resolves.toEqual({
				collateral: 9n,
				debt: 15000n,
			});
			expect(await vault.paidTo("alice")).toBe(1n);
			expect(await vault.custody()).toBe(9n);
		});

		it("refuses a withdrawal that breaks the ratio and changes nothing", async () => {
			const before = await snapshot("alice");

			expect(await failureCode(service.withdrawCollateral("alice", 2n))).toBe(
				"UnsafePositionRatio",
			);
			expect(await snapshot("alice")).toEqual(before);
		});

		it("refuses more than the position holds", async () => {
			expect(await failureCode(service.withdrawCollateral("alice", 11n))).toBe(
				"InvalidAmount",
			);
			expect(await failureCode(service.withdrawCollateral("nobody", 1n))).toBe(
				"InvalidAmount",
			);
		});

		it("keeps collateral when the payout fails", async () => {
			vault.rejectPayoutsTo("alice");
			const before = await snapshot("alice");

			expect(await failureCode(service.withdrawCollateral("alice", 1n))).toBe(
				"TransferFailed",
			);
			expect(await snapshot("alice")).toEqual(before);
		});

		it("serves only committed balances while a payout is in flight", async () => {
			let release: () => void = () => undefined;
			const gate = new Promise<void>((resolve) => {
				release = resolve;
			});
			jest.spyOn(vault, "send").mockImplementation(async () => {
				await gate;
				return false;
			});

			const withdrawal = failureCode(service.withdrawCollateral("alice", 1n));
			let answered = false;
			const balances = service.getBalances("alice").then((b) => {
				answered = true;
				return b;
			});
			const position = service.getPosition("alice");
			const listed = service.listPositions(20);
			await new Promise((resolve) => setImmediate(resolve));
			expect(answered).toBe(false);

			release();
			expect(await withdrawal).toBe("TransferFailed");
			expect(await balances).toEqual({ collateral: 10n, debt: 15000n });
			expect((await position).collateral).toBe("10");
			expect((await listed).items[0]).toMatchObject({
				account: "alice",
				collateral: "10",
			});
		});

		it("releases everything once the debt is repaid", async () => {
			await corn.approve("alice", LEDGER, 15000n);
			await service.repayCorn("alice", 15000n);

			expect(await service.getMaxWithdrawableCollateral("alice")).toBe(10n);
			await expect(service.withdrawCollateral("alice", 10n)).resolves.toEqual({
				collateral: 0n,
				debt: 0n,
			});
		});
	});

	describe("repaying", () => {
		beforeEach(async () => {
			await service.addCollateral("alice", 10n);
			await service.borrowCorn("alice", 15000n);
		});

		it("refuses to repay more than the debt", async () => {
			await corn.approve("alice", LEDGER, UNLIMITED_ALLOWANCE);

			expect(await failureCode(service.repayCorn("alice", 15001n))).toBe(
				"InvalidAmount",
			);
			expect((await service.getBalances("alice")).debt).toBe(15000n);
		});

		it("clears the debt when repaying it exactly", async () => {
			await corn.approve("alice", LEDGER, 15000n);

			await expect(service.repayCorn("alice", 15000n)).resolves.toEqual({
				collateral: 10n,
				debt: 0n,
			});
			expect(await corn.balanceOf("alice")).toBe(0n);
			expect(await corn.allowance("alice", LEDGER)).toBe(0n);
			expect(await corn.balanceOf(LEDGER)).toBe(RESERVE);
		});

		it("repays part of the debt even below the minimum ratio", async () => {
			oracle.setPrice(price(1000n));
			await corn.approve("alice", LEDGER, 5000n);

			await expect(service.repayCorn("alice", 5000n)).resolves.toEqual({
				collateral: 10n,
				debt: 10000n,
			});
		});

		it("reports RepayingFailed without an allowance and changes nothing", async () => {
			const before = await snapshot("alice");

			expect(await failureCode(service.repayCorn("alice", 100n))).toBe(
				"RepayingFailed",
			);
			expect(await snapshot("alice")).toEqual(before);
		});
	});

	describe("liquidating", () => {
		beforeEach(async () => {
			await service.addCollateral("alice", 10n);
			await service.borrowCorn("alice", 15000n);
		});

		it("refuses a safe position", async () => {
			await fundLiquidator("keeper", 20000n, UNLIMITED_ALLOWANCE);

			expect(await failureCode(service.liquidate("keeper", "alice"))).toBe(
				"NotLiquidatable",
			);
			expect(await failureCode(service.liquidate("keeper", "nobody"))).toBe(
				"NotLiquidatable",
			);
		});

		it("hands the whole collateral over when the bonus exceeds it", async () => {
			oracle.setPrice(price(1500n));
			expect(await service.isLiquidatable("alice")).toBe(true);
			await fundLiquidator("keeper", 20000n, 15000n);
			const emit = jest.spyOn(events, "emit");

			const outcome = await service.liquidate("keeper", "alice");

			expect(outcome).toEqual({
				account: "alice",
				liquidator: "keeper",
				price: price(1500n),
				debtRepaid: 15000n,
				collateralPortion: 10n,
				bonus: 1n,
				payout: 10n,
				remainingCollateral: 0n,
			});
			expect(await service.getBalances("alice")).toEqual({
				collateral: 0n,
				debt: 0n,
			});
			expect(await vault.paidTo("keeper")).toBe(10n);
			expect(await vault.custody()).toBe(0n);
			expect(await corn.balanceOf("keeper")).toBe(5000n);
			expect(await corn.allowance("keeper", LEDGER)).toBe(0n);
			// the borrower keeps the borrowed asset
			expect(await corn.balanceOf("alice")).toBe(15000n);
			expect(emit).toHaveBeenCalledWith(
				POSITION_LIQUIDATED_ID,
				expect.objectContaining({
					account: "alice",
					liquidator: "keeper",
					amount: 15000n,
					payout: 10n,
				}),
			);
		});

		it("leaves the remainder to the borrower", async () => {
			await service.addCollateral("bob", 100n);
			await service.borrowCorn("bob", 100000n);
			oracle.setPrice(price(1100n));
			await fundLiquidator("keeper", 100000n, UNLIMITED_ALLOWANCE);

			const outcome = await service.liquidate("keeper", "bob");

			expect(outcome.payout).toBe(99n);
			expect(outcome.remainingCollateral).toBe(1n);
			expect(await service.getBalances("bob")).toEqual({
				collateral: 1n,
				debt: 0n,
			});
		});

		it("requires the liquidator to hold the whole debt", async () => {
			oracle.setPrice(price(1500n));
			await fundLiquidator("keeper", 14999n, UNLIMITED_ALLOWANCE);
			const before = await snapshot("alice", "keeper");

			expect(await failureCode(service.liquidate("keeper", "alice"))).toBe(
				"InsufficientLiquidatorCorn",
			);
			expect(await snapshot("alice", "keeper")).toEqual(before);
		});

		it("reports RepayingFailed when the liquidator has not approved the ledger", async () => {
			oracle.setPrice(price(1500n));
			await fundLiquidator("keeper", 15000n, 0n);
			const before = await snapshot("alice", "keeper");

			expect(await failureCode(service.liquidate("keeper", "alice"))).toBe(
				"RepayingFailed",
			);
			expect(await snapshot("alice", "keeper")).toEqual(before);
		});

		it("refuses the ledger account as liquidator", async () => {
			oracle.setPrice(price(1500n));
			const before = await snapshot("alice", LEDGER);

			await expect(service.liquidate(LEDGER, "alice")).rejects.toBeInstanceOf(
				ForbiddenException,
			);
			expect(await snapshot("alice", LEDGER)).toEqual(before);
		});

		it("refuses collateral priced at zero", async () => {
			oracle.setPrice(0n);
			await fundLiquidator("keeper", 15000n, UNLIMITED_ALLOWANCE);

			expect(await service.isLiquidatable("alice")).toBe(true);
			expect(await failureCode(service.liquidate("keeper", "alice"))).toBe(
				"UnpricedCollateral",
			);
		});

		it("refunds the liquidator when the collateral payout fails", async () => {
			oracle.setPrice(price(1500n));
			await fundLiquidator("keeper", 20000n, 15000n);
			vault.rejectPayoutsTo("keeper");
			const emit = jest.spyOn(events, "emit");
			const before = await snapshot("alice", "keeper");

			expect(await failureCode(service.liquidate("keeper", "alice"))).toBe(
				"TransferFailed",
			);
			expect(await snapshot("alice", "keeper")).toEqual(before);
			expect(await corn.balanceOf(LEDGER)).toBe(RESERVE - 35000n);
			expect(emit).not.toHaveBeenCalled();

			vault.acceptPayoutsTo("keeper");
			await expect(service.liquidate("keeper", "alice")).resolves.toMatchObject({
				payout: 10n,
			});
		});
	});

	describe("reads", () => {
		it("reads an unknown account as an empty position without creating it", async () => {
			expect(await service.getBalances("ghost")).toEqual({
				collateral: 0n,
				debt: 0n,
			});
			expect(await service.calculatePositionRatio("ghost")).toBe(2n ** 256n - 1n);
			expect(await service.isLiquidatable("ghost")).toBe(false);
			expect((await service.listPositions(20)).total).toBe(0);
		});

		it("returns the same view on repeated reads", async () => {
			await service.addCollateral("alice", 10n);
			await service.borrowCorn("alice", 15000n);

			const first = await service.getPosition("alice");
			expect(await service.getPosition("alice")).toEqual(first);
			expect(first).toEqual({
				account: "alice",
				collateral: "10",
				debt: "15000",
				price: "2000000000000000000000",
				collateralValue: "20000",
				ratio: "133",
				liquidatable: false,
				maxBorrow: "16666",
				maxWithdrawable: "0",
			});
		});

		it("quotes the maximum loan for an amount of collateral", async () => {
			expect(await service.getMaxBorrowAmount(10n)).toBe(16666n);
			expect(await service.getMaxBorrowAmount(0n)).toBe(0n);
		});

		it("reports an unreadable price as OracleUnavailable", async () => {
			jest.spyOn(oracle, "currentPrice").mockRejectedValue(new Error("down"));

			expect(await failureCode(service.getPosition("alice"))).toBe(
				"OracleUnavailable",
			);
			expect(await failureCode(service.addCollateral("alice", 1n))).toBe(
				"OracleUnavailable",
			);
			expect(await vault.custody()).toBe(0n);
		});
	});

	describe("listing", () => {
		beforeEach(async () => {
			await service.addCollateral("alice", 10n);
			await service.addCollateral("bob", 10n);
			await service.borrowCorn("bob", 15000n);
			await service.addCollateral("carol", 100n);
			await service.borrowCorn("carol", 15000n);
		});

		it("pages positions newest first", async () => {
			const first = await service.listPositions(2);
			expect(first.items.map((p) => p.account)).toEqual(["carol", "bob"]);
			expect(first.total).toBe(3);
			expect(first.nextCursor).toBeDefined();

			const second = await service.listPositions(
				2,
				cursorFromString(first.nextCursor ?? ""),
			);
			expect(second.items.map((p) => p.account)).toEqual(["alice"]);
			expect(second.nextCursor).toBeUndefined();
		});

		it("filters liquidatable positions at the current price", async () => {
			expect((await service.listPositions(20, emptyCursor, true)).total).toBe(0);

			oracle.setPrice(price(1500n));
			const page = await service.listPositions(20, emptyCursor, true);

			expect(page.items.map((p) => p.account)).toEqual(["bob"]);
			expect(page.items[0].ratio).toBe("100");
			expect(page.total).toBe(1);
		});

		it("lists activity for both sides of a liquidation", async () => {
			oracle.setPrice(price(1500n));
			await fundLiquidator("keeper", 15000n, UNLIMITED_ALLOWANCE);
			await service.liquidate("keeper", "bob");

			const bob = await service.listActivity("bob", 20);
			expect(bob.items.map((a) => a.kind)).toEqual([
				"liquidated",
				"borrowed",
				"collateral-added",
			]);
			expect(bob.items[0]).toMatchObject({
				account: "bob",
				liquidator: "keeper",
				amount: "15000",
				payout: "10",
				price: "1500000000000000000000",
			});

			const keeper = await service.listActivity("keeper", 20);
			expect(keeper.total).toBe(1);
			expect(keeper.items[0].kind).toBe("liquidated");

			const paged = await service.listActivity("bob", 2);
			expect(paged.items).toHaveLength(2);
			const rest = await service.listActivity(
				"bob",
				2,
				cursorFromString(paged.nextCursor ?? ""),
			);
			expect(rest.items.map((a) => a.kind)).toEqual(["collateral-added"]);
		});
	});

	describe("amounts", () => {
		it.each([0n, -1n])("rejects %s for every operation", async (amount) => {
			expect(await failureCode(service.addCollateral("alice", amount))).toBe(
				"InvalidAmount",
			);
			expect(
				await failureCode(service.withdrawCollateral("alice", amount)),
			).toBe("InvalidAmount");
			expect(await failureCode(service.borrowCorn("alice", amount))).toBe(
				"InvalidAmount",
			);
			expect(await failureCode(service.repayCorn("alice", amount))).toBe(
				"InvalidAmount",
			);
			expect(await activity.count()).toBe(0);
		});
	});

	it("serializes concurrent borrows against the same position", async () => {
		await service.addCollateral("alice", 10n);

		const results = await Promise.allSettled(
			[5000n, 5000n, 5000n, 5000n].map((amount) =>
				service.borrowCorn("alice", amount),
			),
		);

		expect(results.map((r) => r.status)).toEqual([
			"fulfilled",
			"fulfilled",
			"fulfilled",
			"rejected",
		]);
		expect(await service.getBalances("alice")).toEqual({
			collateral: 10n,
			debt: 15000n,
		});
		expect(await corn.balanceOf("alice")).toBe(15000n);
	});

	it("keeps custody and supply balanced under random operations", async () => {
		const rand = mulberry32(20251018);
		const pick = <T>(items: readonly T[]): T =>
			items[Math.floor(rand() * items.length)];
		const amount = (max: number) => BigInt(1 + Math.floor(rand() * max));
		const users = ["alice", "bob", "carol"] as const;
		const everyone = [LEDGER, ...users, "keeper"];

		for (const user of users) {
			await corn.approve(user, LEDGER, UNLIMITED_ALLOWANCE);
		}
		await fundLiquidator("keeper", 10n ** 24n, UNLIMITED_ALLOWANCE);

		for (let step = 0; step < 150; step++) {
			const user = pick(users);
			const op = pick([
				"add",
				"withdraw",
				"borrow",
				"repay",
				"liquidate",
				"price",
			] as const);
			const before = await service.getBalances(user);
			const current = await oracle.currentPrice();

			try {
				switch (op) {
					case "add":
						await service.addCollateral(user, amount(1000));
						break;
					case "withdraw":
						await service.withdrawCollateral(user, amount(200));
						break;
					case "borrow":
						await service.borrowCorn(user, amount(500000));
						break;
					case "repay":
						await service.repayCorn(user, amount(300000));
						break;
					case "liquidate":
						await service.liquidate("keeper", user);
						break;
					case "price":
						oracle.setPrice(price(BigInt(500 + Math.floor(rand() * 2500))));
						break;
				}
				if (op === "withdraw" || op === "borrow") {
					expect(isLiquidatable(await service.getBalances(user), current)).toBe(
						false,
					);
				}
			} catch (e) {
				expect(isLedgerException(e)).toBe(true);
				expect(await service.getBalances(user)).toEqual(before);
			}

			const held = await Promise.all(users.map((u) => service.getBalances(u)));
			expect(await vault.custody()).toBe(
				held.reduce((sum, b) => sum + b.collateral, 0n),
			);
			const supply = await Promise.all(everyone.map((a) => corn.balanceOf(a)));
			expect(supply.reduce((sum, b) => sum + b, 0n)).toBe(RESERVE);
		}
	});
});
