import { Body, Controller, Get, Inject, Put } from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiBody,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiServiceUnavailableResponse,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { GetPriceDto, SetPriceInDto } from "./dto/price.dto";
import { PRICE_ORACLE, type PriceOracle, readPrice } from "./price-oracle";
import { SettablePriceOracle } from "./settable-price.oracle";

const PRICE_DECIMALS = 18;

@ApiTags("3 - Oracle")
@ApiExtraModels(ApiEnvelopeShellDto, GetPriceDto)
@Controller("api/v1/oracle")
export class OracleController {
	constructor(
		@Inject(PRICE_ORACLE) private readonly oracle: PriceOracle,
		private readonly settable: SettablePriceOracle,
	) {}

	@Get("price")
	@ApiOperation({ summary: "Current collateral price in debt-asset units" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetPriceDto) })
	@ApiServiceUnavailableResponse({ description: "Oracle unavailable" })
	async getPrice(): Promise<ApiEnvelope<GetPriceDto>> {
		const price = await readPrice(this.oracle);
		return envelope({ price: price.toString(), decimals: PRICE_DECIMALS });
	}

	@Put("price")
	@ApiBasicAuth()
	@ApiBody({ type: SetPriceInDto })
	@ApiOperation({ summary: "Set the oracle price (operator only)" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetPriceDto) })
	@ApiUnauthorizedResponse({ description: "Missing/invalid credentials" })
	setPrice(@Body() dto: SetPriceInDto): ApiEnvelope<GetPriceDto> {
		const price = BigInt(dto.price);
		this.settable.setPrice(price);
		return envelope({ price: price.toString(), decimals: PRICE_DECIMALS });
	}
}
