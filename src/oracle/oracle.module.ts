import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { OracleController } from "./oracle.controller";
import { PRICE_ORACLE } from "./price-oracle";
import { SettablePriceOracle } from "./settable-price.oracle";

@Module({
	providers: [
		{
			provide: SettablePriceOracle,
			inject: [ConfigService, EventEmitter2],
			useFactory: (cfg: ConfigService, events: EventEmitter2) => {
				const initialPrice = cfg.getOrThrow<string>("ORACLE_INITIAL_PRICE");
				Logger.log(`ORACLE_INITIAL_PRICE=${initialPrice}`, "OracleModule");
				return new SettablePriceOracle(BigInt(initialPrice), events);
			},
		},
		{ provide: PRICE_ORACLE, useExisting: SettablePriceOracle },
	],
	controllers: [OracleController],
	exports: [PRICE_ORACLE, SettablePriceOracle],
})
export class OracleModule {}
