import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";
import { bigintTransformer } from "../common/bigint.transformer";

export const ACTIVITY_KIND = [
	"collateral-added",
	"collateral-withdrawn",
	"borrowed",
	"repaid",
	"liquidated",
] as const;
export type ActivityKind = (typeof ACTIVITY_KIND)[number];

/**
 * Append-only record of a committed ledger operation.
 */
@Entity("ledger_activity")
export class LedgerActivity {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "text", enum: ACTIVITY_KIND })
	kind!: ActivityKind;

	// owner of the position
	@Index()
	@Column({ type: "text" })
	account!: string;

	// the liquidator, for liquidations
	@Index()
	@Column({ type: "text", nullable: true })
	counterparty!: string | null;

	// collateral for collateral-*, debt asset otherwise
	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	payout!: bigint | null;

	@Column({ type: "text", transformer: bigintTransformer })
	price!: bigint;

	@CreateDateColumn()
	createdAt!: Date;
}
