import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { DiskBlobStore, MAX_ATTACHMENT_BYTES } from '../disk-blob-store';
import { AttachmentProcessingError } from '../../common/errors/rollcall.errors';
import { testConfig } from '../../test-utils/fakes';

describe('DiskBlobStore', () => {
  let directory: string;
  let store: DiskBlobStore;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'rollcall-media-'));
    store = new DiskBlobStore(
      testConfig({ MEDIA_DIR: directory, MEDIA_PUBLIC_URL: 'https://media.test/files/' }),
    );
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('writes the bytes under a fresh name and links them publicly', async () => {
    const url = await store.store(Buffer.from('jpeg-bytes'), 'image/JPEG');

    expect(url).toMatch(/^https:\/\/media\.test\/files\/[0-9a-f-]{36}\.jpg$/);
    await expect(readFile(join(directory, basename(url)), 'utf8')).resolves.toBe('jpeg-bytes');
  });

  it('refuses media types it cannot name', async () => {
    await expect(store.store(Buffer.from('%PDF'), 'application/pdf')).rejects.toThrow(
      new AttachmentProcessingError('application/pdf'),
    );
  });

  it('refuses empty and oversized attachments', async () => {
    await expect(store.store(Buffer.alloc(0), 'image/png')).rejects.toBeInstanceOf(AttachmentProcessingError);
    await expect(store.store(Buffer.alloc(MAX_ATTACHMENT_BYTES + 1), 'image/png')).rejects.toBeInstanceOf(
      AttachmentProcessingError,
    );
  });
});
