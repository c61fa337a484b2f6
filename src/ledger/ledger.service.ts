import {
	ForbiddenException,
	Inject,
	Injectable,
	Logger,
	OnModuleInit,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { InjectRepository } from "@nestjs/typeorm";
import { nanoid } from "nanoid";
import { Brackets, DataSource, EntityManager, Repository } from "typeorm";

import { COLLATERAL_VAULT, type CollateralVault } from "../assets/collateral.vault";
import {
	DEBT_ASSET_LEDGER,
	type DebtAssetLedger,
	UNLIMITED_ALLOWANCE,
} from "../assets/debt-asset.ledger";
import { Cursor, cursorToString, emptyCursor, Page } from "../common/dto/envelopes";
import { LedgerException, toError } from "../common/errors";
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
	type PositionLiquidated,
} from "../common/ledger.event";
import { SerialLock } from "../common/serial-lock";
import { PRICE_ORACLE, type PriceOracle, readPrice } from "../oracle/price-oracle";
import { GetActivityDto } from "./dto/get-activity.dto";
import { GetPositionDto } from "./dto/get-position.dto";
import { ActivityKind, LedgerActivity } from "./ledger-activity.entity";
import { Position } from "./position.entity";
import {
	Balances,
	collateralValue,
	isLiquidatable,
	LiquidationQuote,
	maxBorrowAmount,
	maxWithdrawableCollateral,
	MIN_COLLATERAL_RATIO,
	positionRatio,
	quoteLiquidation,
	ZERO_BALANCES,
} from "./position-math";

export type LiquidationOutcome = LiquidationQuote & {
	account: string;
	liquidator: string;
	price: bigint;
};

type ActivityInput = {
	kind: ActivityKind;
	account: string;
	amount: bigint;
	price: bigint;
	counterparty?: string;
	payout?: bigint;
};

const MAX_PAGE_SIZE = 100;

@Injectable()
export class LedgerService implements OnModuleInit {
	private readonly logger = new Logger(LedgerService.name);
	// Reads queue here too: the single connection would otherwise expose
	// rows of a transaction that has not committed yet.
	private readonly lock = new SerialLock();
	private readonly ledgerAccount: string;

	constructor(
		configService: ConfigService,
		private readonly dataSource: DataSource,
		@InjectRepository(Position)
		private readonly positionRepository: Repository<Position>,
		@InjectRepository(LedgerActivity)
		private readonly activityRepository: Repository<LedgerActivity>,
		@Inject(PRICE_ORACLE) private readonly oracle: PriceOracle,
		@Inject(DEBT_ASSET_LEDGER) private readonly debtAsset: DebtAssetLedger,
		@Inject(COLLATERAL_VAULT) private readonly vault: CollateralVault,
		private readonly events: EventEmitter2,
	) {
		this.ledgerAccount = configService.getOrThrow<string>("LEDGER_ACCOUNT");
		this.logger.log(`LEDGER_ACCOUNT=${this.ledgerAccount}`);
	}

	/**
	 * Standing authorization for the ledger to move its own debt-asset balance,
	 * used to issue loans and to refund liquidators.
	 */
	async onModuleInit() {
		const ok = await this.debtAsset.approve(
			this.ledgerAccount,
			this.ledgerAccount,
			UNLIMITED_ALLOWANCE,
		);
		if (!ok) {
			throw new Error(
				`Debt asset ledger refused the standing approval for ${this.ledgerAccount}`,
			);
		}
	}

	async addCollateral(account: string, amount: bigint): Promise<Balances> {
		assertPositive(amount);
		const { balances, event } = await this.exclusive(async (manager, price) => {
			const position = await this.loadOrCreate(manager, account);
			position.collateral += amount;
			await manager.save(position);
			await this.record(manager, {
				kind: "collateral-added",
				account,
				amount,
				price,
			});
			if (!(await this.vault.receive(account, amount))) {
				throw new LedgerException(
					"TransferFailed",
					"Collateral could not be taken into custody",
				);
			}
			return {
				balances: toBalances(position),
				event: {
					eventId: nanoid(4),
					account,
					amount,
					price,
					occurredAt: new Date().toISOString(),
				} satisfies CollateralAdded,
			};
		});
		this.events.emit(COLLATERAL_ADDED_ID, event);
		this.logger.log(`${account} added ${amount} collateral`);
		return balances;
	}

	async withdrawCollateral(account: string, amount: bigint): Promise<Balances> {
		assertPositive(amount);
		const { balances, event } = await this.exclusive(async (manager, price) => {
			const position = await this.findPosition(manager, account);
			const available = position?.collateral ?? 0n;
			if (position === null || amount > available) {
				throw new LedgerException(
					"InvalidAmount",
					`Cannot withdraw ${amount}, the position holds ${available} collateral`,
				);
			}
			position.collateral -= amount;
			assertSolvent(position, price);
			await manager.save(position);
			await this.record(manager, {
				kind: "collateral-withdrawn",
				account,
				amount,
				price,
			});
			if (!(await this.vault.send(account, amount))) {
				throw new LedgerException(
					"TransferFailed",
					`Collateral payout to ${account} failed`,
				);
			}
			return {
				balances: toBalances(position),
				event: {
					eventId: nanoid(4),
					account,
					amount,
					price,
					occurredAt: new Date().toISOString(),
				} satisfies CollateralWithdrawn,
			};
		});
		this.events.emit(COLLATERAL_WITHDRAWN_ID, event);
		this.logger.log(`${account} withdrew ${amount} collateral`);
		return balances;
	}

	async borrowCorn(account: string, amount: bigint): Promise<Balances> {
		assertPositive(amount);
		const { balances, event } = await this.exclusive(async (manager, price) => {
			const position = await this.loadOrCreate(manager, account);
			position.debt += amount;
			assertSolvent(position, price);
			await manager.save(position);
			await this.record(manager, { kind: "borrowed", account, amount, price });
			const issued = await this.debtAsset.transferFrom(
				this.ledgerAccount,
				this.ledgerAccount,
				account,
				amount,
			);
			if (!issued) {
				throw new LedgerException(
					"BorrowingFailed",
					`Could not issue ${amount} ${this.debtAsset.symbol} to ${account}`,
				);
			}
			return {
				balances: toBalances(position),
				event: {
					eventId: nanoid(4),
					account,
					amount,
					price,
					occurredAt: new Date().toISOString(),
				} satisfies AssetBorrowed,
			};
		});
		this.events.emit(ASSET_BORROWED_ID, event);
		this.logger.log(`${account} borrowed ${amount} ${this.debtAsset.symbol}`);
		return balances;
	}

	async repayCorn(account: string, amount: bigint): Promise<Balances> {
		assertPositive(amount);
		const { balances, event } = await this.exclusive(async (manager, price) => {
			const position = await this.findPosition(manager, account);
			const owed = position?.debt ?? 0n;
			if (position === null || amount > owed) {
				throw new LedgerException(
					"InvalidAmount",
					`Cannot repay ${amount}, the position owes ${owed}`,
				);
			}
			position.debt -= amount;
			await manager.save(position);
			await this.record(manager, { kind: "repaid", account, amount, price });
			const pulled = await this.debtAsset.transferFrom(
				this.ledgerAccount,
				account,
				this.ledgerAccount,
				amount,
			);
			if (!pulled) {
				throw new LedgerException(
					"RepayingFailed",
					`Could not pull ${amount} ${this.debtAsset.symbol} from ${account}, check balance and allowance`,
				);
			}
			return {
				balances: toBalances(position),
				event: {
					eventId: nanoid(4),
					account,
					amount,
					price,
					occurredAt: new Date().toISOString(),
				} satisfies AssetRepaid,
			};
		});
		this.events.emit(ASSET_REPAID_ID, event);
		this.logger.log(`${account} repaid ${amount} ${this.debtAsset.symbol}`);
		return balances;
	}

	async liquidate(
		liquidator: string,
		account: string,
	): Promise<LiquidationOutcome> {
		if (liquidator === this.ledgerAccount) {
			throw new ForbiddenException("The ledger account cannot liquidate");
		}
		const { outcome, event } = await this.exclusive(async (manager, price) => {
			const position = await this.findPosition(manager, account);
			if (position === null || !isLiquidatable(position, price)) {
				throw new LedgerException(
					"NotLiquidatable",
					`Position of ${account} is not liquidatable`,
				);
			}
			const userDebt = position.debt;
			const liquidatorBalance = await this.debtAsset.balanceOf(liquidator);
			if (liquidatorBalance < userDebt) {
				throw new LedgerException(
					"InsufficientLiquidatorCorn",
					`${liquidator} holds ${liquidatorBalance} ${this.debtAsset.symbol}, ${userDebt} needed`,
				);
			}
			if (collateralValue(position.collateral, price) === 0n) {
				throw new LedgerException(
					"UnpricedCollateral",
					`Collateral of ${account} has no value at price ${price}`,
				);
			}
			const quote = quoteLiquidation(position, price);

			const allowanceBefore = await this.debtAsset.allowance(
				liquidator,
				this.ledgerAccount,
			);
			const pulled = await this.debtAsset.transferFrom(
				this.ledgerAccount,
				liquidator,
				this.ledgerAccount,
				userDebt,
			);
			if (!pulled) {
				throw new LedgerException(
					"RepayingFailed",
					`Could not pull ${userDebt} ${this.debtAsset.symbol} from ${liquidator}, check allowance`,
				);
			}
			try {
				position.debt = 0n;
				position.collateral = quote.remainingCollateral;
				await manager.save(position);
				await this.record(manager, {
					kind: "liquidated",
					account,
					amount: userDebt,
					price,
					counterparty: liquidator,
					payout: quote.payout,
				});
				if (!(await this.vault.send(liquidator, quote.payout))) {
					throw new LedgerException(
						"TransferFailed",
						`Collateral payout to ${liquidator} failed`,
					);
				}
			} catch (e) {
				// the rows roll back with the transaction, the pulled debt asset does not
				await this.refundLiquidator(liquidator, userDebt, allowanceBefore);
				throw e;
			}
			return {
				outcome: { ...quote, account, liquidator, price },
				event: {
					eventId: nanoid(4),
					account,
					liquidator,
					amount: userDebt,
					payout: quote.payout,
					price,
					occurredAt: new Date().toISOString(),
				} satisfies PositionLiquidated,
			};
		});
		this.events.emit(POSITION_LIQUIDATED_ID, event);
		this.logger.log(
			`${liquidator} liquidated ${account}: repaid ${outcome.debtRepaid}, received ${outcome.payout} collateral`,
		);
		return outcome;
	}

	calculateCollateralValue(account: string): Promise<bigint> {
		return this.lock.run(async () => {
			const [balances, price] = await this.balancesAndPrice(account);
			return collateralValue(balances.collateral, price);
		});
	}

	calculatePositionRatio(account: string): Promise<bigint> {
		return this.lock.run(async () => {
			const [balances, price] = await this.balancesAndPrice(account);
			return positionRatio(balances, price);
		});
	}

	isLiquidatable(account: string): Promise<boolean> {
		return this.lock.run(async () => {
			const [balances, price] = await this.balancesAndPrice(account);
			return isLiquidatable(balances, price);
		});
	}

	async getMaxBorrowAmount(collateralAmount: bigint): Promise<bigint> {
		return maxBorrowAmount(collateralAmount, await readPrice(this.oracle));
	}

	getMaxWithdrawableCollateral(account: string): Promise<bigint> {
		return this.lock.run(async () => {
			const [balances, price] = await this.balancesAndPrice(account);
			return maxWithdrawableCollateral(balances, price);
		});
	}

	getBalances(account: string): Promise<Balances> {
		return this.lock.run(() => this.committedBalances(account));
	}

	getPosition(account: string): Promise<GetPositionDto> {
		return this.lock.run(async () => {
			const [balances, price] = await this.balancesAndPrice(account);
			return toPositionDto(account, balances, price);
		});
	}

	/**
	 * Positions newest first. With `liquidatableOnly` the filter is applied at
	 * the current price, so `total` counts liquidatable positions.
	 */
	listPositions(
		limit: number,
		cursor: Cursor = emptyCursor,
		liquidatableOnly = false,
	): Promise<Page<GetPositionDto>> {
		return this.lock.run(() =>
			this.positionsPage(limit, cursor, liquidatableOnly),
		);
	}

	/** Activity where `account` is the position owner or the liquidator, newest first. */
	listActivity(
		account: string,
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<Page<GetActivityDto>> {
		return this.lock.run(() => this.activityPage(account, limit, cursor));
	}

	private async positionsPage(
		limit: number,
		cursor: Cursor,
		liquidatableOnly: boolean,
	): Promise<Page<GetPositionDto>> {
		const take = Math.max(1, Math.min(limit, MAX_PAGE_SIZE));
		const price = await readPrice(this.oracle);

		if (liquidatableOnly) {
			const indebted = await this.positionRepository
				.createQueryBuilder("p")
				.where("p.debt != :zero", { zero: "0" })
				.orderBy("p.id", "DESC")
				.getMany();
			const matching = indebted.filter((p) => isLiquidatable(p, price));
			const rows = matching
				.filter((p) => cursor.idBefore === undefined || p.id < cursor.idBefore)
				.slice(0, take);
			return this.page(rows, matching.length, take, price);
		}

		const qb = this.positionRepository
			.createQueryBuilder("p")
			.orderBy("p.id", "DESC")
			.take(take);
		if (cursor.idBefore !== undefined) {
			qb.where("p.id < :idBefore", { idBefore: cursor.idBefore });
		}
		const [rows, total] = await Promise.all([
			qb.getMany(),
			this.positionRepository.count(),
		]);
		return this.page(rows, total, take, price);
	}

	private async activityPage(
		account: string,
		limit: number,
		cursor: Cursor,
	): Promise<Page<GetActivityDto>> {
		const take = Math.max(1, Math.min(limit, MAX_PAGE_SIZE));
		const involving = new Brackets((w) => {
			w.where("a.account = :account", { account }).orWhere(
				"a.counterparty = :account",
				{ account },
			);
		});
		const rowsQb = this.activityRepository
			.createQueryBuilder("a")
			.where(involving)
			.orderBy("a.id", "DESC")
			.take(take);
		if (cursor.idBefore !== undefined) {
			rowsQb.andWhere("a.id < :idBefore", { idBefore: cursor.idBefore });
		}
		const [rows, total] = await Promise.all([
			rowsQb.getMany(),
			this.activityRepository.createQueryBuilder("a").where(involving).getCount(),
		]);

		let nextCursor: string | undefined;
		if (rows.length === take) {
			nextCursor = cursorToString(rows[rows.length - 1].id);
		}
		const items: GetActivityDto[] = rows.map((r) => ({
			externalId: r.externalId,
			kind: r.kind,
			account: r.account,
			liquidator: r.counterparty ?? undefined,
			amount: r.amount.toString(),
			payout: r.payout?.toString(),
			price: r.price.toString(),
			createdAt: r.createdAt.getTime(),
		}));
		return { items, nextCursor, total };
	}

	/**
	 * Runs `work` alone against one price read, inside a database transaction.
	 * Anything thrown rolls back every row `work` wrote.
	 */
	private exclusive<T>(
		work: (manager: EntityManager, price: bigint) => Promise<T>,
	): Promise<T> {
		return this.lock.run(async () => {
			const price = await readPrice(this.oracle);
			return this.dataSource.transaction((manager) => work(manager, price));
		});
	}

	private findPosition(
		manager: EntityManager,
		account: string,
	): Promise<Position | null> {
		return manager.findOne(Position, { where: { account } });
	}

	private async loadOrCreate(
		manager: EntityManager,
		account: string,
	): Promise<Position> {
		const existing = await this.findPosition(manager, account);
		return (
			existing ??
			manager.create(Position, { account, collateral: 0n, debt: 0n })
		);
	}

	private async record(manager: EntityManager, input: ActivityInput) {
		await manager.save(
			manager.create(LedgerActivity, {
				externalId: nanoid(16),
				kind: input.kind,
				account: input.account,
				counterparty: input.counterparty ?? null,
				amount: input.amount,
				payout: input.payout ?? null,
				price: input.price,
			}),
		);
	}

	/** Returns the pulled debt asset and the allowance it consumed. */
	private async refundLiquidator(
		liquidator: string,
		amount: bigint,
		allowance: bigint,
	) {
		try {
			const refunded = await this.debtAsset.transferFrom(
				this.ledgerAccount,
				this.ledgerAccount,
				liquidator,
				amount,
			);
			if (!refunded) {
				this.logger.error(
					`Refund of ${amount} ${this.debtAsset.symbol} to ${liquidator} was refused`,
				);
				return;
			}
			await this.debtAsset.approve(liquidator, this.ledgerAccount, allowance);
		} catch (e) {
			const err = toError(e);
			this.logger.error(
				`Refund of ${amount} ${this.debtAsset.symbol} to ${liquidator} failed: ${err.message}`,
				err.stack,
			);
		}
	}

	private async committedBalances(account: string): Promise<Balances> {
		const position = await this.positionRepository.findOne({
			where: { account },
		});
		return position === null ? { ...ZERO_BALANCES } : toBalances(position);
	}

	private balancesAndPrice(account: string): Promise<[Balances, bigint]> {
		return Promise.all([this.committedBalances(account), readPrice(this.oracle)]);
	}

	private page(
		rows: Position[],
		total: number,
		take: number,
		price: bigint,
	): Page<GetPositionDto> {
		let nextCursor: string | undefined;
		if (rows.length === take) {
			nextCursor = cursorToString(rows[rows.length - 1].id);
		}
		return {
			items: rows.map((p) => toPositionDto(p.account, p, price)),
			nextCursor,
			total,
		};
	}
}

function assertPositive(amount: bigint) {
	if (amount <= 0n) {
		throw new LedgerException("InvalidAmount", "Amount must be greater than zero");
	}
}

function assertSolvent(balances: Balances, price: bigint) {
	if (isLiquidatable(balances, price)) {
		throw new LedgerException(
			"UnsafePositionRatio",
			`Position ratio ${positionRatio(balances, price)}% is below the ${MIN_COLLATERAL_RATIO}% minimum`,
		);
	}
}

function toBalances(position: Position): Balances {
	return { collateral: position.collateral, debt: position.debt };
}

function toPositionDto(
	account: string,
	balances: Balances,
	price: bigint,
): GetPositionDto {
	return {
		account,
		collateral: balances.collateral.toString(),
		debt: balances.debt.toString(),
		price: price.toString(),
		collateralValue: collateralValue(balances.collateral, price).toString(),
		ratio: positionRatio(balances, price).toString(),
		liquidatable: isLiquidatable(balances, price),
		maxBorrow: maxBorrowAmount(balances.collateral, price).toString(),
		maxWithdrawable: maxWithdrawableCollateral(balances, price).toString(),
	};
}
