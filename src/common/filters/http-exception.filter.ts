import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { toError } from "../errors";

export type ErrorBody = {
	statusCode: number;
	error: string;
	message: string | string[];
	path: string;
	timestamp: string;
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const ctx = host.switchToHttp();
		const res = ctx.getResponse<Response>();
		const req = ctx.getRequest<Request>();

		const body = HttpExceptionFilter.toBody(exception, req.url);
		if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
			const err = toError(exception);
			this.logger.error(
				`${req.method} ${req.url} failed with ${body.statusCode}: ${err.message}`,
				err.stack,
			);
		}
		res.status(body.statusCode).json(body);
	}

	static toBody(exception: unknown, path: string): ErrorBody {
		const timestamp = new Date().toISOString();
		if (!(exception instanceof HttpException)) {
			return {
				statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
				error: "InternalServerError",
				message: "Internal server error",
				path,
				timestamp,
			};
		}
		const statusCode = exception.getStatus();
		const response = exception.getResponse();
		if (typeof response === "string") {
			return {
				statusCode,
				error: exception.name,
				message: response,
				path,
				timestamp,
			};
		}
		// ValidationPipe puts the list of violations in `message`
		const error = "error" in response ? response.error : undefined;
		const message = "message" in response ? response.message : undefined;
		return {
			statusCode,
			error: typeof error === "string" ? error : exception.name,
			message:
				typeof message === "string" || Array.isArray(message)
					? message
					: exception.message,
			path,
			timestamp,
		};
	}
}
