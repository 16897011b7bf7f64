import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { OwnershipForbiddenException } from '../../../common/errors/scheduling.exceptions.js';
import type { Caller, CallerRole } from '../decorators/current-user.decorator.js';
import { RolesGuard } from './roles.guard.js';

describe('RolesGuard', () => {
  let reflector: Reflector;
  let guard: RolesGuard;

  const contextFor = (user?: Caller) => new ExecutionContextHost([{ user }, {}]);
  const requireRoles = (roles: CallerRole[] | undefined) =>
    jest.spyOn(reflector, 'getAllAndOverride').mockReturnValue(roles);

  const doctor: Caller = { userId: 2, role: 'doctor', doctorId: 12, patientId: null };
  const patient: Caller = { userId: 7, role: 'patient', doctorId: null, patientId: 70 };

  beforeEach(() => {
    reflector = new Reflector();
    guard = new RolesGuard(reflector);
  });

  it('allows any caller when no roles are declared', () => {
    requireRoles(undefined);

    expect(guard.canActivate(contextFor(patient))).toBe(true);
  });

  it('allows a caller holding one of the declared roles', () => {
    requireRoles(['doctor', 'admin']);

    expect(guard.canActivate(contextFor(doctor))).toBe(true);
  });

  it('rejects a caller outside the declared roles', () => {
    requireRoles(['doctor', 'admin']);

    expect(() => guard.canActivate(contextFor(patient))).toThrow(
      new OwnershipForbiddenException('Access denied. Required roles: doctor, admin'),
    );
  });

  it('rejects an unauthenticated request', () => {
    requireRoles(['admin']);

    expect(() => guard.canActivate(contextFor())).toThrow(OwnershipForbiddenException);
  });
});
