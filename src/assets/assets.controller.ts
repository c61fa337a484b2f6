import { Body, Controller, Get, Param, Post, UseGuards } from "@nestjs/common";
import {
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { ActingAccount } from "../accounts/account.decorator";
import { ACCOUNT_HEADER, AccountGuard } from "../accounts/account.guard";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { AssetsService } from "./assets.service";
import { ApproveLedgerInDto } from "./dto/approve-ledger.dto";
import { GetAssetBalancesDto } from "./dto/get-asset-balances.dto";
import { TransferDebtAssetInDto } from "./dto/transfer-debt-asset.dto";

@ApiTags("2 - Assets")
@ApiExtraModels(ApiEnvelopeShellDto, GetAssetBalancesDto)
@Controller("api/v1/assets")
export class AssetsController {
	constructor(private readonly assetsService: AssetsService) {}

	@Get(":account")
	@ApiParam({ name: "account", description: "Account identifier" })
	@ApiOperation({ summary: "Debt-asset balance, allowance and collateral paid out" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetAssetBalancesDto) })
	async getBalances(
		@Param("account") account: string,
	): Promise<ApiEnvelope<GetAssetBalancesDto>> {
		return envelope(await this.assetsService.getBalances(account));
	}

	@Post("approve")
	@ApiHeader({ name: ACCOUNT_HEADER, required: true })
	@ApiBody({ type: ApproveLedgerInDto })
	@ApiOperation({ summary: "Allow the ledger to pull debt asset (repay, liquidate)" })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetAssetBalancesDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@UseGuards(AccountGuard)
	async approve(
		@ActingAccount() account: string,
		@Body() dto: ApproveLedgerInDto,
	): Promise<ApiEnvelope<GetAssetBalancesDto>> {
		return envelope(
			await this.assetsService.approveLedger(account, BigInt(dto.amount)),
		);
	}

	@Post("transfer")
	@ApiHeader({ name: ACCOUNT_HEADER, required: true })
	@ApiBody({ type: TransferDebtAssetInDto })
	@ApiOperation({ summary: "Send debt asset to another account" })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(GetAssetBalancesDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid account header" })
	@ApiUnprocessableEntityResponse({ description: "Insufficient balance" })
	@UseGuards(AccountGuard)
	async transfer(
		@ActingAccount() account: string,
		@Body() dto: TransferDebtAssetInDto,
	): Promise<ApiEnvelope<GetAssetBalancesDto>> {
		return envelope(
			await this.assetsService.transfer(account, dto.to, BigInt(dto.amount)),
		);
	}
}
