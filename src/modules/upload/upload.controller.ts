import { Controller, Post, Body } from '@nestjs/common';
import { UploadService } from './upload.service';
import { GetUploadUrlDto, UploadUrlResponseDto } from './dto/upload-url.dto';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { CurrentUser as ICurrentUser } from '../../common/interfaces/response.interface';

@Controller('upload-url')
export class UploadController {
  constructor(private readonly uploadService: UploadService) {}

  /**
   * POST /api/upload-url
   * 获取 R2 直传凭证（key 位于用户自己的 uploads/<userId>/ 下）
   */
  @Post()
  async getUploadUrl(
    @Body() dto: GetUploadUrlDto,
    @CurrentUser() user: ICurrentUser,
  ): Promise<UploadUrlResponseDto> {
    return this.uploadService.getUploadUrl(dto, user);
  }
}
