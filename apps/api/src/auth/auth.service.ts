import { BadRequestException, Injectable } from '@nestjs/common';
import * as argon2 from 'argon2';

import { UsersService } from '../users/users.service';
import { UserEntity } from '../users/entities/user.entity';
import { RegisterDto } from './dto/register.dto';
import { isUniqueViolation } from '../database/unique-violation';
import { ERROR_CODES } from '@shared/constants';

@Injectable()
export class AuthService {
  constructor(private readonly usersService: UsersService) {}

  async register(registerDto: RegisterDto): Promise<UserEntity> {
    const { username, password } = registerDto;

    const existingUser = await this.usersService.findByUsername(username);
    if (existingUser) {
      throw this.usernameTaken();
    }

    const passwordHash = await argon2.hash(password);

    try {
      return await this.usersService.create({ username, passwordHash });
    } catch (error) {
      // Lost a race against another sign-up with the same username
      if (isUniqueViolation(error)) {
        throw this.usernameTaken();
      }
      throw error;
    }
  }

  async validateUser(username: string, password: string): Promise<UserEntity | null> {
    const user = await this.usersService.findByUsername(username);

    if (user && (await argon2.verify(user.passwordHash, password))) {
      return user;
    }

    return null;
  }

  private usernameTaken(): BadRequestException {
    return new BadRequestException({
      code: ERROR_CODES.USERNAME_TAKEN,
      message: 'Username already registered',
    });
  }
}
