import { ApiProperty } from "@nestjs/swagger";
import { IsNumberString, MaxLength } from "class-validator";

export class ApproveLedgerInDto {
	@ApiProperty({
		description: "Allowance granted to the ledger, in debt-asset base units",
		example: "15000",
	})
	@IsNumberString({ no_symbols: true })
	@MaxLength(78)
	amount!: string;
}
