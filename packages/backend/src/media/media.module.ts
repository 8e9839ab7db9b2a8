import { Module } from '@nestjs/common';
import { BLOB_STORE } from '../ports/blob-store.port';
import { DiskBlobStore } from './disk-blob-store';

@Module({
  providers: [{ provide: BLOB_STORE, useClass: DiskBlobStore }],
  exports: [BLOB_STORE],
})
export class MediaModule {}
