import {
	ForbiddenException,
	Inject,
	Injectable,
	Logger,
	UnprocessableEntityException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { COLLATERAL_VAULT, type CollateralVault } from "./collateral.vault";
import { DEBT_ASSET_LEDGER, type DebtAssetLedger } from "./debt-asset.ledger";
import { GetAssetBalancesDto } from "./dto/get-asset-balances.dto";

@Injectable()
export class AssetsService {
	private readonly logger = new Logger(AssetsService.name);
	private readonly ledgerAccount: string;

	constructor(
		configService: ConfigService,
		@Inject(DEBT_ASSET_LEDGER) private readonly debtAsset: DebtAssetLedger,
		@Inject(COLLATERAL_VAULT) private readonly vault: CollateralVault,
	) {
		this.ledgerAccount = configService.getOrThrow<string>("LEDGER_ACCOUNT");
	}

	async getBalances(account: string): Promise<GetAssetBalancesDto> {
		const [balance, allowance, paidOut] = await Promise.all([
			this.debtAsset.balanceOf(account),
			this.debtAsset.allowance(account, this.ledgerAccount),
			this.vault.paidTo(account),
		]);
		return {
			account,
			debtAssetSymbol: this.debtAsset.symbol,
			debtAssetBalance: balance.toString(),
			allowanceToLedger: allowance.toString(),
			collateralPaidOut: paidOut.toString(),
		};
	}

	async approveLedger(
		owner: string,
		amount: bigint,
	): Promise<GetAssetBalancesDto> {
		this.refuseLedgerAccount(owner);
		const ok = await this.debtAsset.approve(owner, this.ledgerAccount, amount);
		if (!ok) {
			throw new UnprocessableEntityException("Approval rejected");
		}
		this.logger.log(
			`${owner} approved the ledger for ${amount} ${this.debtAsset.symbol}`,
		);
		return this.getBalances(owner);
	}

	async transfer(
		from: string,
		to: string,
		amount: bigint,
	): Promise<GetAssetBalancesDto> {
		this.refuseLedgerAccount(from);
		const ok = await this.debtAsset.transfer(from, to, amount);
		if (!ok) {
			throw new UnprocessableEntityException(
				`Insufficient ${this.debtAsset.symbol} balance`,
			);
		}
		return this.getBalances(from);
	}

	private refuseLedgerAccount(account: string) {
		if (account === this.ledgerAccount) {
			throw new ForbiddenException("The ledger account cannot act here");
		}
	}
}
