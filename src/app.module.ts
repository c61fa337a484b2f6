import { ConfigModule, ConfigService } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { AssetsModule } from "./assets/assets.module";
import { BasicAuthMiddleware } from "./common/middlewares/basic-auth.middleware";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { validate } from "./config/configuration";
import { HealthModule } from "./health.module";
import { LedgerModule } from "./ledger/ledger.module";
import { OracleModule } from "./oracle/oracle.module";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true, validate }),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (cfg: ConfigService) => ({
				type: "better-sqlite3",
				database:
					cfg.get<string>("NODE_ENV") === "test"
						? ":memory:"
						: cfg.getOrThrow<string>("SQLITE_DB_PATH"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		OracleModule,
		AssetsModule,
		LedgerModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(BasicAuthMiddleware)
			.forRoutes({ path: "api/v1/oracle/price", method: RequestMethod.PUT });

		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
