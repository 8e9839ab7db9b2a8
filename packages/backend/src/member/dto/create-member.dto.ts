import { ApiProperty } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateMemberDto {
  @ApiProperty({
    description: 'Phone number; 10-digit US numbers are normalized to +1…',
    example: '555-010-0001'
  })
  @IsString()
  @IsNotEmpty()
  address!: string;

  @ApiProperty({
    description: 'Display name of the member',
    example: 'Ann'
  })
  @IsString()
  @IsNotEmpty()
  @MaxLength(80)
  name!: string;

  @ApiProperty({
    description: 'Grant admin commands and confirmations',
    required: false,
    example: false
  })
  @IsOptional()
  @IsBoolean()
  isAdmin?: boolean;
}
