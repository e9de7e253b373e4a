import {
  Body,
  Controller,
  DefaultValuePipe,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { OutboundTokenGuard } from '../guards/outbound-token.guard';
import { InreachPayloadDto } from './dto/inreach-payload.dto';
import { DEFAULT_PING_LIMIT, PingsService } from './pings.service';

@Controller('pings')
export class PingsController {
  constructor(private readonly pingsService: PingsService) {}

  @Post()
  @UseGuards(OutboundTokenGuard)
  @HttpCode(HttpStatus.OK)
  async receive(@Body() dto: InreachPayloadDto) {
    const { ping, outcome } = await this.pingsService.receive(dto);
    return { id: ping.id, outcome, mileMark: ping.mileMark };
  }

  @Get()
  async findRecent(
    @Query('limit', new DefaultValuePipe(DEFAULT_PING_LIMIT), ParseIntPipe) limit: number,
  ) {
    const pings = await this.pingsService.findRecent(Math.min(Math.max(limit, 1), 500));
    return pings.map((ping) => ({
      id: ping.id,
      outcome: ping.outcome,
      mileMark: ping.mileMark,
      receivedAt: ping.receivedAt,
    }));
  }

  @Get(':id')
  async findById(@Param('id', ParseUUIDPipe) id: string) {
    return this.pingsService.findById(id);
  }
}
