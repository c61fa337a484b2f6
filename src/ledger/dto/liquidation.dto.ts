import { ApiProperty } from "@nestjs/swagger";

export class LiquidationOutDto {
	@ApiProperty({ example: "alice" })
	account!: string;

	@ApiProperty({ example: "bob" })
	liquidator!: string;

	@ApiProperty({ description: "Debt asset pulled from the liquidator", example: "15000" })
	debtRepaid!: string;

	@ApiProperty({ description: "Collateral sent to the liquidator", example: "10" })
	payout!: string;

	@ApiProperty({ description: "Collateral left in the position", example: "0" })
	remainingCollateral!: string;

	@ApiProperty({ example: "1500000000000000000000" })
	price!: string;
}
