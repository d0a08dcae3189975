import { ConflictException, Injectable, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { UserEntity } from './entities/user.entity';
import { applyUserProfilePatch, UserProfilePatch } from './user-profile.patch';
import { isUniqueViolation } from '../database/unique-violation';
import { UserProfile } from '@shared/types';
import { ERROR_CODES } from '@shared/constants';

interface CreateUserData {
  username: string;
  passwordHash: string;
}

@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly usersRepository: Repository<UserEntity>,
  ) {}

  async create(userData: CreateUserData): Promise<UserEntity> {
    const user = this.usersRepository.create(userData);
    return this.usersRepository.save(user);
  }

  async findById(id: number): Promise<UserEntity> {
    const user = await this.usersRepository.findOne({ where: { id } });

    if (!user) {
      throw new NotFoundException({
        code: ERROR_CODES.USER_NOT_FOUND,
        message: `User with id ${id} not found`,
      });
    }

    return user;
  }

  async findByUsername(username: string): Promise<UserEntity | null> {
    return this.usersRepository.findOne({ where: { username } });
  }

  async updateProfile(id: number, patch: UserProfilePatch): Promise<UserEntity> {
    const user = applyUserProfilePatch(await this.findById(id), patch);

    try {
      return await this.usersRepository.save(user);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException({
          code: ERROR_CODES.EMAIL_ALREADY_EXISTS,
          message: 'Email is already in use',
        });
      }
      throw error;
    }
  }
}

export function toUserProfile(user: UserEntity): UserProfile {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    instagramUrl: user.instagramUrl,
    twitterUrl: user.twitterUrl,
    linkedinUrl: user.linkedinUrl,
    description: user.description,
    interests: user.interests,
    selfieUrl: user.selfieUrl,
    selfieCid: user.selfieCid,
    selfieHeight: user.selfieHeight,
    selfieWidth: user.selfieWidth,
    createdAt: user.createdAt.toISOString(),
    updatedAt: user.updatedAt.toISOString(),
  };
}
