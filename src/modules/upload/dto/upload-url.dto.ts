import { IsString, IsNotEmpty, IsInt, IsOptional, Min } from 'class-validator';

export class GetUploadUrlDto {
  @IsString()
  @IsNotEmpty()
  filename!: string;

  @IsString()
  @IsNotEmpty()
  content_type!: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  size_bytes?: number;
}

export interface UploadUrlResponseDto {
  upload_url: string;
  key: string;
  public_url: string;
  expires_in: number;
}
