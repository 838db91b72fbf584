import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  NoSuchKey,
} from "@aws-sdk/client-s3";

export interface ObjectStore {
  /** Resolves to undefined when nothing is stored under the key */
  getObject(key: string): Promise<Buffer | undefined>;
  putObject(key: string, body: Buffer, contentType?: string): Promise<void>;
  deleteObject(key: string): Promise<void>;
  listKeys(prefix: string): Promise<string[]>;
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly bucket: string,
    private readonly s3: S3Client
  ) {}

  async getObject(key: string): Promise<Buffer | undefined> {
    try {
      const r = await this.s3.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key })
      );
      if (!r.Body) return undefined;
      return Buffer.from(await r.Body.transformToByteArray());
    } catch (e) {
      if (e instanceof NoSuchKey) return undefined;
      throw e;
    }
  }

  async putObject(key: string, body: Buffer, contentType?: string) {
    await this.s3.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );
  }

  async deleteObject(key: string) {
    await this.s3.send(
      new DeleteObjectCommand({ Bucket: this.bucket, Key: key })
    );
  }

  async listKeys(prefix: string): Promise<string[]> {
    const keys: string[] = [];
    let token: string | undefined;
    do {
      const r = await this.s3.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: token,
        })
      );
      for (const obj of r.Contents ?? []) if (obj.Key) keys.push(obj.Key);
      token = r.IsTruncated ? r.NextContinuationToken : undefined;
    } while (token);
    return keys;
  }
}

export class MemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Buffer>();

  async getObject(key: string) {
    const buf = this.objects.get(key);
    return buf ? Buffer.from(buf) : undefined;
  }

  async putObject(key: string, body: Buffer) {
    this.objects.set(key, Buffer.from(body));
  }

  async deleteObject(key: string) {
    this.objects.delete(key);
  }

  async listKeys(prefix: string) {
    return [...this.objects.keys()].filter((k) => k.startsWith(prefix)).sort();
  }
}
