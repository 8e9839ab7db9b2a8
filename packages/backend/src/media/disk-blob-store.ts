import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BlobStore } from '../ports/blob-store.port';
import { AttachmentProcessingError } from '../common/errors/rollcall.errors';

const EXTENSIONS: Readonly<Record<string, string>> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/heic': 'heic',
  'video/mp4': 'mp4',
  'video/quicktime': 'mov',
  'video/3gpp': '3gp',
  'audio/mpeg': 'mp3',
  'audio/mp4': 'm4a',
  'audio/amr': 'amr',
  'audio/ogg': 'ogg',
};

export const MAX_ATTACHMENT_BYTES = 5 * 1024 * 1024;

/**
 * Writes attachments under MEDIA_DIR and links them through MEDIA_PUBLIC_URL,
 * which a static file server or CDN is expected to front.
 */
@Injectable()
export class DiskBlobStore implements BlobStore {
  private readonly logger = new Logger(DiskBlobStore.name);
  private readonly directory: string;
  private readonly publicUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.directory = resolve(this.configService.get<string>('MEDIA_DIR', './media'));
    this.publicUrl = this.configService.get<string>('MEDIA_PUBLIC_URL', 'http://localhost:4000/media').replace(/\/+$/, '');
  }

  async store(bytes: Buffer, mimeType: string): Promise<string> {
    const extension = EXTENSIONS[mimeType.toLowerCase()];
    if (!extension) {
      throw new AttachmentProcessingError(mimeType, new Error('unsupported media type'));
    }
    if (bytes.length === 0 || bytes.length > MAX_ATTACHMENT_BYTES) {
      throw new AttachmentProcessingError(mimeType, new Error(`size ${bytes.length} outside 1..${MAX_ATTACHMENT_BYTES} bytes`));
    }

    const name = `${uuidv4()}.${extension}`;
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(join(this.directory, name), bytes);
    } catch (error) {
      throw new AttachmentProcessingError(mimeType, error);
    }

    this.logger.log(`Stored ${mimeType} attachment as ${name} (${bytes.length} bytes)`);
    return `${this.publicUrl}/${name}`;
  }
}
