import {
  S3Client,
  PutObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import type { AppConfig } from "../config/env.js";
import { NotFoundError } from "../utils/errors.js";

export interface ObjectStorage {
  put(key: string, body: Buffer, contentType: string): Promise<void>;
  get(key: string): Promise<Buffer>;
  delete(key: string): Promise<void>;
  /** Short-lived URL the client can fetch the object from directly. */
  getDownloadUrl(key: string, options?: { filename?: string; contentType?: string }): Promise<string>;
}

export const documentKey = (userId: string, documentId: string, filename: string) =>
  `documents/${userId}/${documentId}/${filename}`;

export const templateKey = (userId: string, templateId: string) =>
  `templates/${userId}/${templateId}.docx`;

export const generatedKey = (userId: string, templateId: string, at: Date = new Date()) =>
  `generated/${userId}/${templateId}/${at.getTime()}.docx`;

export class S3Storage implements ObjectStorage {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly signedUrlTtlSeconds: number;

  constructor(config: AppConfig["storage"]) {
    this.client = new S3Client({
      region: config.region,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
    this.bucket = config.bucket;
    this.signedUrlTtlSeconds = config.signedUrlTtlSeconds;
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ContentDisposition: "inline",
      })
    );
  }

  async get(key: string): Promise<Buffer> {
    const result = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
    if (!result.Body) throw new NotFoundError(`Object not found: ${key}`);
    const bytes = await result.Body.transformToByteArray();
    return Buffer.from(bytes);
  }

  async delete(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }

  async getDownloadUrl(
    key: string,
    options: { filename?: string; contentType?: string } = {}
  ): Promise<string> {
    const disposition = options.filename
      ? `inline; filename="${options.filename.replace(/"/g, "")}"`
      : "inline";

    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: key,
      ResponseContentDisposition: disposition,
      ResponseContentType: options.contentType,
    });

    return getSignedUrl(this.client, command, { expiresIn: this.signedUrlTtlSeconds });
  }
}
