import { ApiProperty } from "@nestjs/swagger";

export class GetPositionDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ description: "Collateral base units", example: "10" })
	collateral!: string;

	@ApiProperty({ description: "Debt-asset base units owed", example: "15000" })
	debt!: string;

	@ApiProperty({
		description: "Price the figures below were computed with (18 decimals)",
		example: "2000000000000000000000",
	})
	price!: string;

	@ApiProperty({ description: "Collateral value in debt-asset units", example: "20000" })
	collateralValue!: string;

	@ApiProperty({
		description: "Collateralization ratio in percent, 2^256-1 without debt",
		example: "133",
	})
	ratio!: string;

	@ApiProperty({ example: false })
	liquidatable!: boolean;

	@ApiProperty({ description: "Most debt the current collateral can back", example: "16666" })
	maxBorrow!: string;

	@ApiProperty({ description: "Estimated withdrawable collateral", example: "0" })
	maxWithdrawable!: string;
}
