import { Injectable } from '@nestjs/common';

/** Source of "now"; replaced in tests to pin the current instant. */
@Injectable()
export class Clock {
  now(): Date {
    return new Date();
  }
}
