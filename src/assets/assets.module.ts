import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { AssetsController } from "./assets.controller";
import { AssetsService } from "./assets.service";
import { COLLATERAL_VAULT } from "./collateral.vault";
import { DEBT_ASSET_LEDGER } from "./debt-asset.ledger";
import { InMemoryCollateralVault } from "./in-memory-collateral.vault";
import { InMemoryDebtAssetLedger } from "./in-memory-debt-asset.ledger";

export const DEBT_ASSET_SYMBOL = "CORN";

@Module({
	providers: [
		{
			provide: DEBT_ASSET_LEDGER,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => {
				const ledgerAccount = cfg.getOrThrow<string>("LEDGER_ACCOUNT");
				const reserve = BigInt(cfg.getOrThrow<string>("DEBT_ASSET_RESERVE"));
				Logger.log(
					`Minting ${reserve} ${DEBT_ASSET_SYMBOL} to ${ledgerAccount}`,
					"AssetsModule",
				);
				return new InMemoryDebtAssetLedger(DEBT_ASSET_SYMBOL, [
					{ account: ledgerAccount, amount: reserve },
				]);
			},
		},
		{
			provide: COLLATERAL_VAULT,
			useFactory: () => new InMemoryCollateralVault(),
		},
		AssetsService,
	],
	controllers: [AssetsController],
	exports: [DEBT_ASSET_LEDGER, COLLATERAL_VAULT],
})
export class AssetsModule {}
