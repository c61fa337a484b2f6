import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { toError } from "./common/errors";

dotenv.config();

async function bootstrap() {
	const app = await NestFactory.create(AppModule);

	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	app.enableCors();
	app.enableShutdownHooks();

	const config = new DocumentBuilder()
		.setTitle("Lending Ledger API")
		.setDescription(
			"Acting account header: `X-Account-Id: <account>`. Price updates use HTTP basic auth.",
		)
		.setVersion("0.1.0")
		.addBasicAuth({ type: "http", scheme: "basic" }, "basic")
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
			persistAuthorization: true,
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((e: unknown) => {
	const err = toError(e);
	Logger.error(`Failed to start: ${err.message}`, err.stack, "Bootstrap");
	process.exit(1);
});
