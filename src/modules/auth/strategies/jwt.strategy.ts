import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { z } from 'zod';
import {
  CALLER_ROLES,
  type Caller,
} from '../decorators/current-user.decorator.js';

const JwtPayloadSchema = z.object({
  sub: z.coerce.number().int().positive(),
  role: z.enum(CALLER_ROLES),
  doctorId: z.number().int().positive().nullish(),
  patientId: z.number().int().positive().nullish(),
});

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('JWT_SECRET'),
    });
  }

  validate(payload: unknown): Caller {
    const parsed = JwtPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UnauthorizedException('Malformed token payload');
    }
    return {
      userId: parsed.data.sub,
      role: parsed.data.role,
      doctorId: parsed.data.doctorId ?? null,
      patientId: parsed.data.patientId ?? null,
    };
  }
}
