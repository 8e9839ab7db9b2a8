import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { Attachment } from '@rollcall/common';
import {
  IsArray,
  IsBase64,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested
} from 'class-validator';

export class InboundAttachmentDto {
  @ApiProperty({ description: 'MIME type of the attachment', example: 'image/jpeg' })
  @IsString()
  @IsNotEmpty()
  mimeType!: string;

  @ApiProperty({ description: 'Base64-encoded bytes' })
  @IsBase64()
  data!: string;
}

export class InboundSmsDto {
  @ApiProperty({ description: 'Sender phone number', example: '+15550100001' })
  @IsString()
  @IsNotEmpty()
  from!: string;

  @ApiProperty({ description: 'Message text; may be empty for picture messages', example: 'Dinner at 7?' })
  @IsString()
  @MaxLength(1600)
  body!: string;

  @ApiProperty({ type: [InboundAttachmentDto], required: false })
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => InboundAttachmentDto)
  attachments?: InboundAttachmentDto[];
}

export class InboundReplyDto {
  @ApiProperty({ description: 'Reply owed to the sender, or null', nullable: true, type: String })
  reply!: string | null;
}

export function toAttachments(sms: InboundSmsDto): Attachment[] {
  return (sms.attachments ?? []).map(attachment => ({
    mimeType: attachment.mimeType,
    data: Buffer.from(attachment.data, 'base64'),
  }));
}
