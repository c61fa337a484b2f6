import {
	Body,
	Controller,
	DefaultValuePipe,
	Get,
	Param,
	ParseBoolPipe,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";

import { ActingAccount } from "../accounts/account.decorator";
import { ACCOUNT_HEADER, AccountGuard } from "../accounts/account.guard";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import {
	type SseEvent,
	ServerSentEventsService,
	type LedgerSse,
} from "../common/server-sent-events.service";
import { AmountInDto } from "./dto/amount.dto";
import { GetActivityDto } from "./dto/get-activity.dto";
import { GetPositionDto } from "./dto/get-position.dto";
import { LiquidationOutDto } from "./dto/liquidation.dto";
import { LedgerService } from "./ledger.service";

const LIMIT_QUERY = {
	name: "limit",
	required: false,
	description: "Max items to return (1–100)",
	schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
} as const;
const CURSOR_QUERY = {
	name: "cursor",
	required: false,
	description: "Opaque cursor from previous page",
	schema: { type: "string" },
} as const;

@ApiTags("1 - Positions")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	GetPositionDto,
	GetActivityDto,
	LiquidationOutDto,
)
@Controller("api/v1/positions")
export class LedgerController {
	constructor(
		private readonly ledgerService: LedgerService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@ApiQuery(LIMIT_QUERY)
	@ApiQuery(CURSOR_QUERY)
	@ApiQuery({
		name: "liquidatable",
		required: false,
		description: "Only positions liquidatable at the current price",
		schema: { type: "boolean" },
	})
	@ApiOperation({ summary: "List positions, newest first" })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(GetPositionDto) })
	async list(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
		@Query("liquidatable", new DefaultValuePipe(false), ParseBoolPipe)
		liquidatable: boolean,
	): Promise<ApiPaginatedEnvelope<GetPositionDto[]>> {
		const { items, nextCursor, total } = await this.ledgerService.listPositions(
			limit,
			cursor,
			liquidatable,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Sse("events")
	@ApiQuery({ name: "account", required: false })
	@ApiOperation({ summary: "Server-sent ledger events" })
	events(@Query("account") account?: string): Observable<SseEvent<LedgerSse>> {
		return this.sseService
			.ledgerEvents(account)
			.pipe(map((data) => ({ data })));
	}

	@Get(":account")
	@ApiParam({ name: "account", description: "Account identifier" })
	@ApiOperation({ summary: "Position of an account, priced now" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetPositionDto) })
	async getOne(
		@Param("account") account: string,
	): Promise<ApiEnvelope<GetPositionDto>> {
		return envelope(await this.ledgerService.getPosition(account));
	}

	@Get(":account/activity")
	@ApiParam({ name: "account", description: "Account identifier" })
	@ApiQuery(LIMIT_QUERY)
	@ApiQuery(CURSOR_QUERY)
	@ApiOperation({ summary: "Ledger activity of an account, newest first" })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(GetActivityDto) })
	async activity(
		@Param("account") account: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetActivityDto[]>> {
		const { items, nextCursor, total } = await this.ledgerService.listActivity(
			account,
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Post("collateral")
	@ApiHeader({ name: ACCOUNT_HEADER, required: true })
	@ApiBody({ type: AmountInDto })
	@ApiOperation({ summary: "Deposit collateral" })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetPositionDto) })
	@ApiBadRequestResponse({ description: "InvalidAmount" })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@UseGuards(AccountGuard)
	async addCollateral(
		@ActingAccount() account: string,
		@Body() dto: AmountInDto,
	): Promise<ApiEnvelope<GetPositionDto>> {
		await this.ledgerService.addCollateral(account, BigInt(dto.amount));
		return envelope(await this.ledgerService.getPosition(account));
	}

	@Post("collateral/withdraw")
	@ApiHeader({ name: ACCOUNT_HEADER, required: true })
	@ApiBody({ type: AmountInDto })
	@ApiOperation({ summary: "Withdraw collateral" })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetPositionDto) })
	@ApiBadRequestResponse({ description: "InvalidAmount" })
	@ApiUnprocessableEntityResponse({ description: "UnsafePositionRatio" })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@UseGuards(AccountGuard)
	async withdrawCollateral(
		@ActingAccount() account: string,
		@Body() dto: AmountInDto,
	): Promise<ApiEnvelope<GetPositionDto>> {
		await this.ledgerService.withdrawCollateral(account, BigInt(dto.amount));
		return envelope(await this.ledgerService.getPosition(account));
	}

	@Post("borrow")
	@ApiHeader({ name: ACCOUNT_HEADER, required: true })
	@ApiBody({ type: AmountInDto })
	@ApiOperation({ summary: "Borrow the debt asset against collateral" })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetPositionDto) })
	@ApiBadRequestResponse({ description: "InvalidAmount" })
	@ApiUnprocessableEntityResponse({ description: "UnsafePositionRatio" })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@UseGuards(AccountGuard)
	async borrow(
		@ActingAccount() account: string,
		@Body() dto: AmountInDto,
	): Promise<ApiEnvelope<GetPositionDto>> {
		await this.ledgerService.borrowCorn(account, BigInt(dto.amount));
		return envelope(await this.ledgerService.getPosition(account));
	}

	@Post("repay")
	@ApiHeader({ name: ACCOUNT_HEADER, required: true })
	@ApiBody({ type: AmountInDto })
	@ApiOperation({
		summary: "Repay debt, the ledger must be approved for the amount first",
	})
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetPositionDto) })
	@ApiBadRequestResponse({ description: "InvalidAmount" })
	@ApiUnprocessableEntityResponse({ description: "RepayingFailed" })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@UseGuards(AccountGuard)
	async repay(
		@ActingAccount() account: string,
		@Body() dto: AmountInDto,
	): Promise<ApiEnvelope<GetPositionDto>> {
		await this.ledgerService.repayCorn(account, BigInt(dto.amount));
		return envelope(await this.ledgerService.getPosition(account));
	}

	@Post(":account/liquidate")
	@ApiHeader({ name: ACCOUNT_HEADER, required: true })
	@ApiParam({ name: "account", description: "Owner of the unsafe position" })
	@ApiOperation({
		summary:
			"Repay an unsafe position's whole debt and receive its collateral plus a bonus",
	})
	@ApiCreatedResponse({ schema: getSchemaPathForDto(LiquidationOutDto) })
	@ApiUnprocessableEntityResponse({
		description: "NotLiquidatable, InsufficientLiquidatorCorn, RepayingFailed",
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@UseGuards(AccountGuard)
	async liquidate(
		@ActingAccount() liquidator: string,
		@Param("account") account: string,
	): Promise<ApiEnvelope<LiquidationOutDto>> {
		const outcome = await this.ledgerService.liquidate(liquidator, account);
		return envelope({
			account: outcome.account,
			liquidator: outcome.liquidator,
			debtRepaid: outcome.debtRepaid.toString(),
			payout: outcome.payout.toString(),
			remainingCollateral: outcome.remainingCollateral.toString(),
			price: outcome.price.toString(),
		});
	}
}
