import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { OwnershipForbiddenException } from '../../../common/errors/scheduling.exceptions.js';
import type { Caller, CallerRole } from '../decorators/current-user.decorator.js';
import { ROLES_KEY } from '../decorators/roles.decorator.js';

@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const allowed = this.reflector.getAllAndOverride<CallerRole[] | undefined>(
      ROLES_KEY,
      [context.getHandler(), context.getClass()],
    );
    if (!allowed || allowed.length === 0) {
      return true;
    }

    const { user } = context.switchToHttp().getRequest<{ user?: Caller }>();
    if (!user || !allowed.includes(user.role)) {
      throw new OwnershipForbiddenException(
        `Access denied. Required roles: ${allowed.join(', ')}`,
      );
    }
    return true;
  }
}
