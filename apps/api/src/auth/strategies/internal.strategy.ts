import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { BasicStrategy as PassportBasicStrategy } from 'passport-http';
import { timingSafeEqual } from 'crypto';

import { APP_CONFIG, AppConfig, InternalAuthConfig } from '../../config/app.config';
import { ERROR_CODES } from '@shared/constants';

export interface InternalPrincipal {
  service: string;
}

function safeEquals(actual: string, expected: string): boolean {
  const actualBytes = Buffer.from(actual);
  const expectedBytes = Buffer.from(expected);
  return actualBytes.length === expectedBytes.length && timingSafeEqual(actualBytes, expectedBytes);
}

/**
 * HTTP Basic for service-to-service calls (ingestion, admin).
 */
@Injectable()
export class InternalStrategy extends PassportStrategy(PassportBasicStrategy, 'internal') {
  private readonly credentials: InternalAuthConfig;

  constructor(@Inject(APP_CONFIG) appConfig: AppConfig) {
    super();
    this.credentials = appConfig.internalAuth;
  }

  validate(username: string, password: string): InternalPrincipal {
    const usernameMatches = safeEquals(username, this.credentials.username);
    const passwordMatches = safeEquals(password, this.credentials.password);

    if (!(usernameMatches && passwordMatches)) {
      throw new UnauthorizedException({
        code: ERROR_CODES.UNAUTHORIZED,
        message: 'Invalid internal service credentials',
      });
    }

    return { service: username };
  }
}
