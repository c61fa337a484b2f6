import { Controller, Get } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(private readonly configService: ConfigService) {}

	@Get()
	@ApiOperation({ summary: "Health check endpoint" })
	@ApiResponse({
		status: 200,
		description: "Application is healthy",
		schema: {
			type: "object",
			properties: {
				status: { type: "string", example: "ok" },
				timestamp: { type: "string", example: "2026-01-12T10:00:00.000Z" },
				uptime: { type: "number", example: 12345 },
				environment: { type: "string", example: "production" },
				ledgerAccount: { type: "string", example: "lending-ledger" },
			},
		},
	})
	healthCheck() {
		return {
			status: "ok",
			timestamp: new Date().toISOString(),
			uptime: process.uptime(),
			environment: this.configService.get<string>("NODE_ENV", "development"),
			ledgerAccount: this.configService.getOrThrow<string>("LEDGER_ACCOUNT"),
		};
	}
}
