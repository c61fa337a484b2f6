import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { NextFunction, Request, Response } from "express";
import { timingSafeEqual } from "node:crypto";

/**
 * Guards operator routes (price updates) with the backoffice credentials.
 * With no credentials configured every request is refused.
 */
@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	private readonly logger = new Logger(BasicAuthMiddleware.name);

	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Authentication required");
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");
		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const expectedUser = this.config.get<string>("BACKOFFICE_BASIC_USER");
		const expectedPass = this.config.get<string>("BACKOFFICE_BASIC_PASS");
		if (!expectedUser || !expectedPass) {
			this.logger.warn("Backoffice credentials are not configured");
			return res.status(401).send("Unauthorized");
		}

		const ok =
			constantTimeEquals(username, expectedUser) &&
			constantTimeEquals(password, expectedPass);
		if (!ok) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Restricted"');
			return res.status(401).send("Unauthorized");
		}

		return next();
	}
}

function constantTimeEquals(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		timingSafeEqual(bb, bb);
		return false;
	}
	return timingSafeEqual(ab, bb);
}
