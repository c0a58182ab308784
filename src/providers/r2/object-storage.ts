export interface PresignedUrlResult {
  upload_url: string;
  key: string;
  public_url: string;
}

/**
 * 对象存储抽象（R2 实现；测试中替换为内存实现）
 */
export abstract class ObjectStorage {
  abstract getPresignedUploadUrl(
    key: string,
    contentType: string,
    expiresIn?: number,
  ): Promise<PresignedUrlResult>;

  abstract getPresignedDownloadUrl(key: string, expiresIn?: number): Promise<string>;

  abstract uploadFile(
    key: string,
    body: Buffer | string,
    contentType: string,
    signal?: AbortSignal,
  ): Promise<string>;

  abstract downloadFile(key: string, signal?: AbortSignal): Promise<Buffer>;

  abstract deleteFiles(keys: string[]): Promise<void>;

  /**
   * 生成存储路径
   */
  generateKey(prefix: string, filename: string): string {
    const timestamp = Date.now();
    const randomStr = Math.random().toString(36).substring(2, 8);
    const ext = filename.includes('.') ? filename.split('.').pop() : '';
    return ext ? `${prefix}/${timestamp}-${randomStr}.${ext}` : `${prefix}/${timestamp}-${randomStr}`;
  }
}
