import { SetMetadata } from '@nestjs/common';
import type { CallerRole } from './current-user.decorator.js';

export const ROLES_KEY = 'roles';

export const Roles = (...roles: CallerRole[]) => SetMetadata(ROLES_KEY, roles);
