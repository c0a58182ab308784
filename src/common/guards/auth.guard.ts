import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { CurrentUser } from '../interfaces/response.interface';

export const IS_PUBLIC_KEY = 'isPublic';

interface GuardedRequest {
  headers: Record<string, string | string[] | undefined>;
  user?: CurrentUser;
}

/**
 * 认证守卫
 * 校验 Supabase JWT（Authorization: Bearer），写入 request.user
 */
@Injectable()
export class AuthGuard implements CanActivate {
  constructor(
    private reflector: Reflector,
    private supabaseService: SupabaseService,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    // 检查是否为公开路由
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<GuardedRequest>();
    const authHeader = request.headers['authorization'];

    if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
      const user = await this.supabaseService.verifyToken(authHeader.substring(7));
      if (user) {
        request.user = { id: user.id };
        return true;
      }
    }

    throw new UnauthorizedException({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  }
}
