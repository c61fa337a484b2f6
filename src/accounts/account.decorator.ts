import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { Request } from "express";
import { ACCOUNT_HEADER, accountFromRequest } from "./account.guard";

/** The acting account, see {@link AccountGuard}. */
export const ActingAccount = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const account = accountFromRequest(ctx.switchToHttp().getRequest<Request>());
		if (account === undefined) {
			throw new UnauthorizedException(
				`Missing or malformed ${ACCOUNT_HEADER} header`,
			);
		}
		return account;
	},
);
