import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString, Matches, MaxLength } from "class-validator";
import { ACCOUNT_ID_PATTERN } from "../../config/configuration";

export class TransferDebtAssetInDto {
	@ApiProperty({ example: "bob" })
	@Matches(ACCOUNT_ID_PATTERN)
	to!: string;

	@ApiProperty({ description: "Debt-asset base units", example: "500" })
	@IsNumberString({ no_symbols: true })
	@MaxLength(78)
	amount!: string;
}
