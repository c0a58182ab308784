import { Injectable, BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ObjectStorage } from '../../providers/r2/object-storage';
import { SUPPORTED_AUDIO_TYPES } from '../../common/audio';
import { CurrentUser } from '../../common/interfaces/response.interface';
import { GetUploadUrlDto, UploadUrlResponseDto } from './dto/upload-url.dto';

const UPLOAD_URL_TTL_SEC = 3600;

/**
 * 用户上传目录；创建播客时据此校验 audio_key 归属
 */
export function uploadPrefix(userId: string): string {
  return `uploads/${userId}`;
}

@Injectable()
export class UploadService {
  private readonly maxSizeBytes: number;

  constructor(
    private storage: ObjectStorage,
    private configService: ConfigService,
  ) {
    this.maxSizeBytes = this.configService.get<number>('upload.maxSizeBytes') ?? 100 * 1024 * 1024;
  }

  /**
   * 获取预签名上传 URL
   */
  async getUploadUrl(dto: GetUploadUrlDto, user: CurrentUser): Promise<UploadUrlResponseDto> {
    const contentType = dto.content_type.toLowerCase();

    // 校验 MIME 类型
    if (!SUPPORTED_AUDIO_TYPES.includes(contentType)) {
      throw new BadRequestException({
        code: 'UNSUPPORTED_FORMAT',
        message: `不支持的音频格式: ${dto.content_type}`,
        details: { allowed: SUPPORTED_AUDIO_TYPES },
      });
    }

    if (dto.size_bytes !== undefined && dto.size_bytes > this.maxSizeBytes) {
      throw new BadRequestException({
        code: 'INVALID_INPUT',
        message: `文件过大，最大 ${Math.floor(this.maxSizeBytes / 1024 / 1024)}MB`,
      });
    }

    // 生成存储路径
    const key = this.storage.generateKey(uploadPrefix(user.id), dto.filename);
    const result = await this.storage.getPresignedUploadUrl(key, contentType, UPLOAD_URL_TTL_SEC);

    return {
      upload_url: result.upload_url,
      key: result.key,
      public_url: result.public_url,
      expires_in: UPLOAD_URL_TTL_SEC,
    };
  }
}
