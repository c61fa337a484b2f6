import { HttpException, HttpStatus } from "@nestjs/common";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

export const LEDGER_ERROR_CODE = [
	"InvalidAmount",
	"UnsafePositionRatio",
	"NotLiquidatable",
	"InsufficientLiquidatorCorn",
	"UnpricedCollateral",
	"RepayingFailed",
	"BorrowingFailed",
	"TransferFailed",
	"OracleUnavailable",
] as const;
export type LedgerErrorCode = (typeof LEDGER_ERROR_CODE)[number];

const STATUS_BY_CODE: Record<LedgerErrorCode, HttpStatus> = {
	InvalidAmount: HttpStatus.BAD_REQUEST,
	UnsafePositionRatio: HttpStatus.UNPROCESSABLE_ENTITY,
	NotLiquidatable: HttpStatus.UNPROCESSABLE_ENTITY,
	InsufficientLiquidatorCorn: HttpStatus.UNPROCESSABLE_ENTITY,
	UnpricedCollateral: HttpStatus.UNPROCESSABLE_ENTITY,
	RepayingFailed: HttpStatus.UNPROCESSABLE_ENTITY,
	BorrowingFailed: HttpStatus.BAD_GATEWAY,
	TransferFailed: HttpStatus.BAD_GATEWAY,
	OracleUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * A ledger operation failed. The ledger state is the same as before the call.
 */
export class LedgerException extends HttpException {
	constructor(
		readonly code: LedgerErrorCode,
		message: string,
		options?: { cause?: unknown },
	) {
		const status = STATUS_BY_CODE[code];
		super({ statusCode: status, error: code, message }, status, options);
	}
}

export function isLedgerException(
	err: unknown,
	code?: LedgerErrorCode,
): err is LedgerException {
	return (
		err instanceof LedgerException && (code === undefined || err.code === code)
	);
}
