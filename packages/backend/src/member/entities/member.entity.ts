import { Entity, Column, PrimaryColumn, CreateDateColumn } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';

@Entity('members')
export class Member {
  @ApiProperty({
    description: 'Unique identifier of the member',
    example: '123e4567-e89b-12d3-a456-426614174000'
  })
  @PrimaryColumn('uuid')
  id!: string;

  @ApiProperty({
    description: 'Phone number in E.164 form',
    example: '+15550100001'
  })
  @Column({ unique: true })
  address!: string;

  @ApiProperty({
    description: 'Display name used as the broadcast prefix',
    example: 'Ann'
  })
  @Column()
  name!: string;

  @ApiProperty({
    description: 'Admins get confirmations and admin commands',
    example: false
  })
  @Column({ default: false })
  isAdmin!: boolean;

  @ApiProperty({
    description: 'Inactive members receive nothing and cannot broadcast',
    example: true
  })
  @Column({ default: true })
  active!: boolean;

  @ApiProperty({
    description: 'When the member joined the roster',
    example: '2025-01-23T12:50:49.167Z'
  })
  @CreateDateColumn()
  createdAt!: Date;
}
