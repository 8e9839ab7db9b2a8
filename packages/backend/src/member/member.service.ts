import { Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { Not, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { MemberIdentity, Member as MemberDto, Recipient } from '@rollcall/common';
import { Member } from './entities/member.entity';
import { CreateMemberDto } from './dto/create-member.dto';
import { RecipientDirectory } from '../ports/recipient-directory.port';
import { normalizeAddress } from '../common/utils/address';
import { guardStore } from '../common/errors/rollcall.errors';

@Injectable()
export class MemberService implements RecipientDirectory, OnModuleInit {
  private readonly logger = new Logger(MemberService.name);

  constructor(
    @InjectRepository(Member)
    private readonly memberRepository: Repository<Member>,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit() {
    const adminAddress = this.configService.get<string>('ROSTER_ADMIN_ADDRESS');
    if (!adminAddress) {
      return;
    }
    const name = this.configService.get<string>('ROSTER_ADMIN_NAME', 'Admin');
    await this.addMember({ address: adminAddress, name, isAdmin: true });
    this.logger.log(`Roster admin ${normalizeAddress(adminAddress)} ensured`);
  }

  async activeRecipients(excludeAddress?: string): Promise<Recipient[]> {
    const members = await this.guard('activeRecipients', () =>
      this.memberRepository.find({
        where: excludeAddress
          ? { active: true, address: Not(normalizeAddress(excludeAddress)) }
          : { active: true },
        order: { createdAt: 'ASC' },
      }),
    );

    return members.map(member => ({
      address: member.address,
      name: member.name,
      isAdmin: member.isAdmin,
    }));
  }

  async identity(address: string): Promise<MemberIdentity | null> {
    const member = await this.guard('identity', () =>
      this.memberRepository.findOneBy({ address: normalizeAddress(address), active: true }),
    );
    return member ? { name: member.name, isAdmin: member.isAdmin } : null;
  }

  /** Adds a member, or reactivates and renames an existing one. */
  async addMember(dto: CreateMemberDto): Promise<MemberDto> {
    const address = normalizeAddress(dto.address);
    this.logger.log('=== Adding member ===', { address, name: dto.name });

    const existing = await this.guard('addMember', () =>
      this.memberRepository.findOneBy({ address }),
    );

    const member = existing ?? this.memberRepository.create({ id: uuidv4(), address });
    member.name = dto.name.trim();
    member.isAdmin = dto.isAdmin ?? existing?.isAdmin ?? false;
    member.active = true;

    const saved = await this.guard('addMember', () => this.memberRepository.save(member));
    this.logger.log(`Member ${existing ? 'updated' : 'created'}: ${saved.address}`);
    return this.toDto(saved);
  }

  async deactivate(address: string): Promise<MemberDto> {
    const normalized = normalizeAddress(address);
    const member = await this.guard('deactivate', () =>
      this.memberRepository.findOneBy({ address: normalized }),
    );
    if (!member) {
      throw new NotFoundException(`Member ${normalized} not found`);
    }

    member.active = false;
    const saved = await this.guard('deactivate', () => this.memberRepository.save(member));
    this.logger.log(`Member deactivated: ${saved.address}`);
    return this.toDto(saved);
  }

  async findAll(): Promise<MemberDto[]> {
    const members = await this.guard('findAll', () =>
      this.memberRepository.find({ order: { createdAt: 'ASC' } }),
    );
    return members.map(member => this.toDto(member));
  }

  async countActive(): Promise<number> {
    return this.guard('countActive', () => this.memberRepository.count({ where: { active: true } }));
  }

  private guard<T>(operation: string, query: () => Promise<T>): Promise<T> {
    return guardStore(this.logger, `directory.${operation}`, query);
  }

  private toDto(member: Member): MemberDto {
    return {
      id: member.id,
      address: member.address,
      name: member.name,
      isAdmin: member.isAdmin,
      active: member.active,
      createdAt: member.createdAt,
    };
  }
}
