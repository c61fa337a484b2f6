import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString } from "class-validator";

export class SetPriceInDto {
	@ApiProperty({
		description:
			"Debt-asset units per collateral unit, scaled by 1e18, as a decimal string",
		example: "1500000000000000000000",
	})
	@IsNumberString({ no_symbols: true })
	price!: string;
}

export class GetPriceDto {
	@ApiProperty({ example: "2000000000000000000000" })
	price!: string;

	@ApiProperty({ description: "Fixed-point decimals of `price`", example: 18 })
	decimals!: number;
}
