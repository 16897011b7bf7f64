import { createParamDecorator, ExecutionContext } from '@nestjs/common';

export const CALLER_ROLES = ['patient', 'doctor', 'admin'] as const;
export type CallerRole = (typeof CALLER_ROLES)[number];

/** Authenticated principal, resolved from a verified bearer token. */
export interface Caller {
  userId: number;
  role: CallerRole;
  doctorId: number | null;
  patientId: number | null;
}

export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Caller | undefined => {
    const request = ctx.switchToHttp().getRequest<{ user?: Caller }>();
    return request.user;
  },
);
