import { Logger } from "@nestjs/common";
import { DebtAssetLedger, UNLIMITED_ALLOWANCE } from "./debt-asset.ledger";

export type GenesisAllocation = {
	account: string;
	amount: bigint;
};

/**
 * Process-local token ledger. Data is lost when the process exits.
 */
export class InMemoryDebtAssetLedger implements DebtAssetLedger {
	private readonly logger = new Logger(InMemoryDebtAssetLedger.name);
	private readonly balances = new Map<string, bigint>();
	// owner -> spender -> remaining allowance
	private readonly allowances = new Map<string, Map<string, bigint>>();

	constructor(
		readonly symbol: string,
		genesis: GenesisAllocation[] = [],
	) {
		for (const { account, amount } of genesis) {
			if (amount < 0n) {
				throw new Error(`Negative genesis allocation for ${account}`);
			}
			this.credit(account, amount);
		}
	}

	async balanceOf(account: string): Promise<bigint> {
		return this.balances.get(account) ?? 0n;
	}

	async allowance(owner: string, spender: string): Promise<bigint> {
		return this.allowances.get(owner)?.get(spender) ?? 0n;
	}

	async approve(
		owner: string,
		spender: string,
		amount: bigint,
	): Promise<boolean> {
		if (amount < 0n || amount > UNLIMITED_ALLOWANCE) {
			return false;
		}
		const byOwner = this.allowances.get(owner) ?? new Map<string, bigint>();
		byOwner.set(spender, amount);
		this.allowances.set(owner, byOwner);
		return true;
	}

	async transfer(from: string, to: string, amount: bigint): Promise<boolean> {
		return this.move(from, to, amount);
	}

	async transferFrom(
		spender: string,
		from: string,
		to: string,
		amount: bigint,
	): Promise<boolean> {
		const allowed = await this.allowance(from, spender);
		if (allowed < amount) {
			this.logger.debug(
				`${spender} may move ${allowed} ${this.symbol} of ${from}, ${amount} requested`,
			);
			return false;
		}
		if (!this.move(from, to, amount)) {
			return false;
		}
		if (allowed !== UNLIMITED_ALLOWANCE) {
			await this.approve(from, spender, allowed - amount);
		}
		return true;
	}

	private move(from: string, to: string, amount: bigint): boolean {
		if (amount < 0n) {
			return false;
		}
		const available = this.balances.get(from) ?? 0n;
		if (available < amount) {
			this.logger.debug(
				`${from} holds ${available} ${this.symbol}, cannot move ${amount}`,
			);
			return false;
		}
		this.balances.set(from, available - amount);
		this.credit(to, amount);
		return true;
	}

	private credit(account: string, amount: bigint) {
		this.balances.set(account, (this.balances.get(account) ?? 0n) + amount);
	}
}
