import type { ValueTransformer } from "typeorm";

/**
 * Stores unsigned amounts as decimal text, SQLite integers stop at 2^63.
 */
export const bigintTransformer: ValueTransformer = {
	to: (value: bigint | null | undefined): string | null | undefined =>
		value === null || value === undefined ? value : value.toString(10),
	from: (value: string | null): bigint | null =>
		value === null ? null : BigInt(value),
};
