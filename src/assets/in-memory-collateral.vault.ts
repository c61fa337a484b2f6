import { Logger } from "@nestjs/common";
import { CollateralVault } from "./collateral.vault";

/**
 * Process-local collateral custody. Deposits are taken as attached to the call;
 * payouts can be made to fail per recipient with {@link rejectPayoutsTo}.
 */
export class InMemoryCollateralVault implements CollateralVault {
	private readonly logger = new Logger(InMemoryCollateralVault.name);
	private held = 0n;
	private readonly paid = new Map<string, bigint>();
	private readonly rejecting = new Set<string>();

	async receive(from: string, amount: bigint): Promise<boolean> {
		if (amount < 0n) {
			return false;
		}
		this.held += amount;
		this.logger.debug(`Received ${amount} from ${from}, custody ${this.held}`);
		return true;
	}

	async send(to: string, amount: bigint): Promise<boolean> {
		if (amount < 0n || amount > this.held) {
			return false;
		}
		if (this.rejecting.has(to)) {
			this.logger.warn(`Payout of ${amount} to ${to} rejected`);
			return false;
		}
		this.held -= amount;
		this.paid.set(to, (this.paid.get(to) ?? 0n) + amount);
		return true;
	}

	async paidTo(account: string): Promise<bigint> {
		return this.paid.get(account) ?? 0n;
	}

	async custody(): Promise<bigint> {
		return this.held;
	}

	rejectPayoutsTo(account: string) {
		this.rejecting.add(account);
	}

	acceptPayoutsTo(account: string) {
		this.rejecting.delete(account);
	}
}
