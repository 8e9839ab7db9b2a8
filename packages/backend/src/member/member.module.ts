import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Member } from './entities/member.entity';
import { MemberService } from './member.service';
import { MemberController } from './member.controller';
import { RECIPIENT_DIRECTORY } from '../ports/recipient-directory.port';

@Module({
  imports: [TypeOrmModule.forFeature([Member])],
  controllers: [MemberController],
  providers: [
    MemberService,
    { provide: RECIPIENT_DIRECTORY, useExisting: MemberService },
  ],
  exports: [MemberService, RECIPIENT_DIRECTORY],
})
export class MemberModule {}
