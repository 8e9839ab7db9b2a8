import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { InboundService } from './inbound.service';
import { InboundReplyDto, InboundSmsDto, toAttachments } from './dto/inbound-sms.dto';

@ApiTags('webhook')
@Controller('webhook')
export class InboundController {
  constructor(private readonly inboundService: InboundService) {}

  @Post('sms')
  @HttpCode(200)
  @ApiOperation({
    summary: 'Receive one SMS from the gateway',
    description: 'Runs the message through commands, reaction detection and broadcast'
  })
  @ApiResponse({ status: 200, description: 'Reply for the sender, if any', type: InboundReplyDto })
  @ApiResponse({ status: 400, description: 'Malformed payload' })
  async receive(@Body() dto: InboundSmsDto): Promise<InboundReplyDto> {
    const reply = await this.inboundService.handleInbound(dto.from, dto.body, toAttachments(dto));
    return { reply };
  }
}
