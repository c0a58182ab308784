import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectsCommand,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { ObjectStorage, PresignedUrlResult } from './object-storage';

@Injectable()
export class R2Service extends ObjectStorage implements OnModuleInit {
  private readonly logger = new Logger(R2Service.name);
  private client: S3Client | null = null;
  private bucket = '';
  private publicUrl = '';

  constructor(private configService: ConfigService) {
    super();
  }

  onModuleInit() {
    const endpoint = this.configService.get<string>('r2.endpoint');
    const accessKey = this.configService.get<string>('r2.accessKey');
    const secretKey = this.configService.get<string>('r2.secretKey');
    this.bucket = this.configService.get<string>('r2.bucket') || '';
    this.publicUrl = this.configService.get<string>('r2.publicUrl') || '';

    if (!endpoint || !accessKey || !secretKey) {
      this.logger.warn('R2 configuration missing');
      return;
    }

    this.client = new S3Client({
      region: 'auto',
      endpoint,
      credentials: {
        accessKeyId: accessKey,
        secretAccessKey: secretKey,
      },
    });

    this.logger.log('R2 client initialized');
  }

  private getClient(): S3Client {
    if (!this.client) {
      throw new Error('R2 client not configured');
    }
    return this.client;
  }

  /**
   * 生成预签名上传 URL
   */
  async getPresignedUploadUrl(
    key: string,
    contentType: string,
    expiresIn: number = 3600,
  ): Promise<PresignedUrlResult> {
    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      ContentType: contentType,
    });

    const upload_url = await getSignedUrl(this.getClient(), command, { expiresIn });

    return {
      upload_url,
      key,
      public_url: `${this.publicUrl}/${key}`,
    };
  }

  /**
   * 生成预签名下载 URL
   */
  async getPresignedDownloadUrl(key: string, expiresIn: number = 3600): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: key,
    });

    return getSignedUrl(this.getClient(), command, { expiresIn });
  }

  /**
   * 上传文件
   */
  async uploadFile(
    key: string,
    body: Buffer | string,
    contentType: string,
    signal?: AbortSignal,
  ): Promise<string> {
    const command = new PutObjectCommand({
      Bucket: this.bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
    });

    await this.getClient().send(command, { abortSignal: signal });
    return `${this.publicUrl}/${key}`;
  }

  /**
   * 下载文件到内存
   */
  async downloadFile(key: string, signal?: AbortSignal): Promise<Buffer> {
    const command = new GetObjectCommand({
      Bucket: this.bucket,
      Key: key,
    });

    const response = await this.getClient().send(command, { abortSignal: signal });
    if (!response.Body) {
      throw new Error(`Empty object body: ${key}`);
    }
    const bytes = await response.Body.transformToByteArray();
    return Buffer.from(bytes);
  }

  /**
   * 批量删除文件
   */
  async deleteFiles(keys: string[]): Promise<void> {
    if (keys.length === 0) return;

    const command = new DeleteObjectsCommand({
      Bucket: this.bucket,
      Delete: {
        Objects: keys.map((key) => ({ Key: key })),
        Quiet: true,
      },
    });

    const response = await this.getClient().send(command);
    if (response.Errors && response.Errors.length > 0) {
      const failed = response.Errors.map((e) => e.Key).join(', ');
      throw new Error(`Failed to delete objects: ${failed}`);
    }
  }
}
