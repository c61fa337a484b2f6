import request from "supertest";
import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";

import { AppModule } from "../src/app.module";
import { HttpExceptionFilter } from "../src/common/filters/http-exception.filter";

export const OPERATOR = { user: "operator", pass: "test-secret" } as const;

/** Decimal string of a whole-unit price at 18 decimals. */
export const priceOf = (units: bigint) => (units * 10n ** 18n).toString();

/** The application as `main.ts` sets it up, on an in-memory database. */
export async function createTestApp(): Promise<INestApplication> {
	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = moduleFixture.createNestApplication();
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	await app.init();
	return app;
}

export function setPrice(app: INestApplication, units: bigint) {
	return request(app.getHttpServer())
		.put("/api/v1/oracle/price")
		.auth(OPERATOR.user, OPERATOR.pass)
		.send({ price: priceOf(units) })
		.expect(200);
}

export function postAs(
	app: INestApplication,
	account: string,
	path: string,
	body: object = {},
) {
	return request(app.getHttpServer())
		.post(path)
		.set("X-Account-Id", account)
		.send(body);
}
