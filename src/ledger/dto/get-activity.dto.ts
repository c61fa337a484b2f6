import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { ACTIVITY_KIND, ActivityKind } from "../ledger-activity.entity";

export class GetActivityDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	externalId!: string;

	@ApiProperty({ enum: ACTIVITY_KIND })
	kind!: ActivityKind;

	@ApiProperty({ description: "Position owner", example: "alice" })
	account!: string;

	@ApiPropertyOptional({ description: "Liquidator, for liquidations", example: "bob" })
	liquidator?: string;

	@ApiProperty({
		description: "Collateral units for collateral moves, debt-asset units otherwise",
		example: "15000",
	})
	amount!: string;

	@ApiPropertyOptional({ description: "Collateral paid to the liquidator", example: "10" })
	payout?: string;

	@ApiProperty({ example: "2000000000000000000000" })
	price!: string;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;
}
