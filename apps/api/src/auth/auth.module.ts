import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { UsersModule } from '../users/users.module';
import { BasicStrategy } from './strategies/basic.strategy';
import { InternalStrategy } from './strategies/internal.strategy';

@Module({
  imports: [UsersModule, PassportModule],
  providers: [AuthService, BasicStrategy, InternalStrategy],
  controllers: [AuthController],
  exports: [AuthService],
})
export class AuthModule {}
