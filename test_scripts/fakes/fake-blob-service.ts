import { Readable } from 'node:stream';
import { RestError } from '@azure/storage-blob';
import type { PublicAccessType } from '@azure/storage-blob';

interface FakeContainer {
  readonly blobs: Map<string, Buffer>;
  readonly publicAccess: PublicAccessType | undefined;
}

/**
 * In-memory stand-in for the parts of BlobServiceClient that BlobStore uses.
 * Hand it to BlobStore through the createServiceClient option.
 */
export class FakeBlobService {
  readonly containers = new Map<string, FakeContainer>();
  readonly createdContainers: string[] = [];
  readonly deletedBlobs: string[] = [];

  /** Number of uploadStream calls, failed ones included. */
  uploadAttempts = 0;

  /** Number of upcoming uploadStream calls that fail with a 503. */
  failNextUploads = 0;

  /** When set, every download fails with this error. */
  downloadFailure: Error | undefined;

  addContainer(name: string, publicAccess?: PublicAccessType): void {
    this.containers.set(name, { blobs: new Map(), publicAccess });
  }

  putBlob(containerName: string, blobName: string, content: Buffer): void {
    this.container(containerName).blobs.set(blobName, content);
  }

  getBlob(containerName: string, blobName: string): Buffer | undefined {
    return this.containers.get(containerName)?.blobs.get(blobName);
  }

  listContainers(): AsyncIterableIterator<{ name: string; properties: { publicAccess?: PublicAccessType } }> {
    const items = [...this.containers.entries()].map(([name, container]) => ({
      name,
      properties: { publicAccess: container.publicAccess },
    }));
    return (async function* () {
      yield* items;
    })();
  }

  async createContainer(name: string): Promise<void> {
    if (this.containers.has(name)) {
      throw new RestError('The specified container already exists.', { statusCode: 409 });
    }
    this.addContainer(name);
    this.createdContainers.push(name);
  }

  getContainerClient(name: string): FakeContainerClient {
    return new FakeContainerClient(this, name);
  }

  container(name: string): FakeContainer {
    const container = this.containers.get(name);
    if (!container) {
      throw new RestError('The specified container does not exist.', { statusCode: 404 });
    }
    return container;
  }
}

class FakeContainerClient {
  constructor(
    private readonly service: FakeBlobService,
    readonly containerName: string,
  ) {}

  get url(): string {
    return `https://acme.blob.core.windows.net/${this.containerName}`;
  }

  listBlobsFlat(): AsyncIterableIterator<{ name: string }> {
    const names = [...this.service.container(this.containerName).blobs.keys()];
    return (async function* () {
      for (const name of names) {
        yield { name };
      }
    })();
  }

  async deleteBlob(name: string): Promise<void> {
    const blobs = this.service.container(this.containerName).blobs;
    if (!blobs.delete(name)) {
      throw new RestError('The specified blob does not exist.', { statusCode: 404 });
    }
    this.service.deletedBlobs.push(name);
  }

  getBlockBlobClient(name: string): { uploadStream(stream: Readable): Promise<void> } {
    return {
      uploadStream: async (stream: Readable): Promise<void> => {
        this.service.uploadAttempts++;
        if (this.service.failNextUploads > 0) {
          this.service.failNextUploads--;
          throw new RestError('Service unavailable', { statusCode: 503 });
        }

        const chunks: Buffer[] = [];
        for await (const chunk of stream) {
          chunks.push(Buffer.from(chunk as Uint8Array));
        }
        this.service.putBlob(this.containerName, name, Buffer.concat(chunks));
      },
    };
  }

  getBlobClient(name: string): { download(offset?: number): Promise<{ readableStreamBody?: Readable }> } {
    return {
      download: async (): Promise<{ readableStreamBody?: Readable }> => {
        if (this.service.downloadFailure) {
          throw this.service.downloadFailure;
        }
        const content = this.service.getBlob(this.containerName, name);
        if (content === undefined) {
          throw new RestError('The specified blob does not exist.', { statusCode: 404 });
        }
        return { readableStreamBody: Readable.from([content]) };
      },
    };
  }
}
