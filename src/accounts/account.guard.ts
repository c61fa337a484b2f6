import {
	CanActivate,
	ExecutionContext,
	ForbiddenException,
	Injectable,
	UnauthorizedException,
} from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { Request } from "express";
import { ACCOUNT_ID_PATTERN } from "../config/configuration";

export const ACCOUNT_HEADER = "x-account-id";

export function accountFromRequest(req: Request): string | undefined {
	const value = req.header(ACCOUNT_HEADER)?.trim();
	return value && ACCOUNT_ID_PATTERN.test(value) ? value : undefined;
}

/**
 * Requires the acting account in the `X-Account-Id` header. The ledger's own
 * account never acts through the API.
 */
@Injectable()
export class AccountGuard implements CanActivate {
	private readonly ledgerAccount: string;

	constructor(configService: ConfigService) {
		this.ledgerAccount = configService.getOrThrow<string>("LEDGER_ACCOUNT");
	}

	canActivate(context: ExecutionContext): boolean {
		const req = context.switchToHttp().getRequest<Request>();
		const account = accountFromRequest(req);
		if (account === undefined) {
			throw new UnauthorizedException(
				`Missing or malformed ${ACCOUNT_HEADER} header`,
			);
		}
		if (account === this.ledgerAccount) {
			throw new ForbiddenException("The ledger account cannot act here");
		}
		return true;
	}
}
