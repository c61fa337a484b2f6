import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";
import { bigintTransformer } from "../common/bigint.transformer";

@Entity("positions")
export class Position {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	account!: string;

	@Column({ type: "text", default: "0", transformer: bigintTransformer })
	collateral!: bigint;

	@Column({ type: "text", default: "0", transformer: bigintTransformer })
	debt!: bigint;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
