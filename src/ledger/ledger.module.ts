import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { AssetsModule } from "../assets/assets.module";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { OracleModule } from "../oracle/oracle.module";
import { LedgerActivity } from "./ledger-activity.entity";
import { LedgerController } from "./ledger.controller";
import { LedgerService } from "./ledger.service";
import { Position } from "./position.entity";

@Module({
	imports: [
		TypeOrmModule.forFeature([Position, LedgerActivity]),
		OracleModule,
		AssetsModule,
	],
	providers: [LedgerService, ServerSentEventsService],
	controllers: [LedgerController],
	exports: [LedgerService],
})
export class LedgerModule {}
