import { SetMetadata } from '@nestjs/common';
import { IS_PUBLIC_KEY } from '../guards/auth.guard';

/** 跳过认证 */
export const Public = () => SetMetadata(IS_PUBLIC_KEY, true);
