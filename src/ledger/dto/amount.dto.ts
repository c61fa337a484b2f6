import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString, MaxLength } from "class-validator";

export class AmountInDto {
	@ApiProperty({
		description: "Amount in base units, as a decimal string",
		example: "15000",
	})
	@IsNumberString({ no_symbols: true })
	@MaxLength(78)
	amount!: string;
}
