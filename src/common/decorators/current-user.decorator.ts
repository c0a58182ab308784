import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { CurrentUser as ICurrentUser } from '../interfaces/response.interface';

interface AuthenticatedRequest {
  user?: ICurrentUser;
}

/**
 * 获取当前用户装饰器
 * 从请求对象中提取 AuthGuard 写入的用户信息
 */
export const CurrentUser = createParamDecorator(
  (data: unknown, ctx: ExecutionContext): ICurrentUser => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.user) {
      throw new UnauthorizedException({
        code: 'UNAUTHORIZED',
        message: 'Authentication required',
      });
    }
    return request.user;
  },
);
