import { plainToInstance } from "class-transformer";
import {
	IsIn,
	IsInt,
	IsNumberString,
	IsOptional,
	IsString,
	Matches,
	Max,
	Min,
	validateSync,
} from "class-validator";

export const ACCOUNT_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,64}$/;

export const DEFAULTS = {
	PORT: 3000,
	SQLITE_DB_PATH: "data/ledger.sqlite",
	LEDGER_ACCOUNT: "lending-ledger",
	// 2000 debt units per collateral unit
	ORACLE_INITIAL_PRICE: "2000000000000000000000",
	DEBT_ASSET_RESERVE: "1000000000000000000000000000000",
} as const;

export class EnvironmentVariables {
	@IsOptional()
	@IsIn(["development", "production", "test"])
	NODE_ENV?: "development" | "production" | "test";

	@IsInt()
	@Min(0)
	@Max(65535)
	PORT: number = DEFAULTS.PORT;

	@IsString()
	SQLITE_DB_PATH: string = DEFAULTS.SQLITE_DB_PATH;

	@Matches(ACCOUNT_ID_PATTERN)
	LEDGER_ACCOUNT: string = DEFAULTS.LEDGER_ACCOUNT;

	@IsNumberString({ no_symbols: true })
	ORACLE_INITIAL_PRICE: string = DEFAULTS.ORACLE_INITIAL_PRICE;

	@IsNumberString({ no_symbols: true })
	DEBT_ASSET_RESERVE: string = DEFAULTS.DEBT_ASSET_RESERVE;

	@IsOptional()
	@IsString()
	BACKOFFICE_BASIC_USER?: string;

	@IsOptional()
	@IsString()
	BACKOFFICE_BASIC_PASS?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
	const validated = plainToInstance(EnvironmentVariables, config, {
		enableImplicitConversion: true,
	});
	const errors = validateSync(validated, { skipMissingProperties: false });
	if (errors.length > 0) {
		throw new Error(`Invalid environment: ${errors.toString()}`);
	}
	return validated;
}
