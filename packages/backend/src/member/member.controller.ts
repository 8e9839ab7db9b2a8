import { Body, Controller, Delete, Get, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { MemberService } from './member.service';
import { Member } from './entities/member.entity';
import { CreateMemberDto } from './dto/create-member.dto';

@ApiTags('members')
@Controller('members')
export class MemberController {
  constructor(private readonly memberService: MemberService) {}

  @Get()
  @ApiOperation({
    summary: 'Get the roster',
    description: 'All members, active or not, in joining order'
  })
  @ApiResponse({
    status: 200,
    description: 'Roster retrieved successfully',
    type: Member,
    isArray: true
  })
  async findAll() {
    return this.memberService.findAll();
  }

  @Post()
  @ApiOperation({ summary: 'Add or reactivate a member' })
  @ApiResponse({ status: 201, description: 'Member saved', type: Member })
  async create(@Body() dto: CreateMemberDto) {
    return this.memberService.addMember(dto);
  }

  @Delete(':address')
  @ApiOperation({ summary: 'Deactivate a member' })
  @ApiResponse({ status: 200, description: 'Member deactivated', type: Member })
  @ApiResponse({ status: 404, description: 'Member not found' })
  async deactivate(@Param('address') address: string) {
    return this.memberService.deactivate(address);
  }
}
