import { ApiProperty } from "@nestjs/swagger";

export class GetAssetBalancesDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "CORN" })
	debtAssetSymbol!: string;

	@ApiProperty({ description: "Debt-asset balance", example: "15000" })
	debtAssetBalance!: string;

	@ApiProperty({
		description: "Debt asset the ledger may pull from this account",
		example: "15000",
	})
	allowanceToLedger!: string;

	@ApiProperty({
		description: "Collateral paid out to this account by withdrawals and liquidations",
		example: "10",
	})
	collateralPaidOut!: string;
}
