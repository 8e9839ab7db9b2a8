import { Controller, Get, NotFoundException, Param, ParseIntPipe, DefaultValuePipe, Query, Inject } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Broadcast, DeliveryAttempt } from '@rollcall/common';
import { MESSAGE_LEDGER, MessageLedger } from '../ports/message-ledger.port';

const MAX_HISTORY = 50;

@ApiTags('broadcasts')
@Controller('broadcasts')
export class BroadcastsController {
  constructor(
    @Inject(MESSAGE_LEDGER)
    private readonly ledger: MessageLedger,
  ) {}

  @Get('recent')
  @ApiOperation({ summary: 'Latest broadcasts with their reaction summaries' })
  @ApiQuery({ name: 'limit', required: false, description: `Defaults to 10, capped at ${MAX_HISTORY}` })
  @ApiResponse({ status: 200, description: 'Returns broadcasts, newest first' })
  async recent(
    @Query('limit', new DefaultValuePipe(10), ParseIntPipe) limit: number,
  ): Promise<Broadcast[]> {
    return this.ledger.recentBroadcasts(new Date(0), null, Math.min(Math.max(limit, 1), MAX_HISTORY));
  }

  @Get(':id/deliveries')
  @ApiOperation({ summary: 'Delivery attempts recorded for a broadcast, digest or update' })
  @ApiResponse({ status: 200, description: 'Returns one attempt per recipient' })
  @ApiResponse({ status: 404, description: 'No deliveries recorded for this id' })
  async deliveries(@Param('id') id: string): Promise<DeliveryAttempt[]> {
    const attempts = await this.ledger.deliveryAttempts(id);
    if (attempts.length === 0) {
      throw new NotFoundException('No deliveries recorded for this message');
    }
    return attempts;
  }
}
