import { Controller, Get, Put, Body, UseGuards, Req } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { ProfileService } from './profile.service';
import { UpdateProfileDto } from './dto/update-profile.dto';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request';
import { ApiResponse, UserProfile } from '@shared/types';

@Controller('profile')
@UseGuards(AuthGuard('basic'))
export class ProfileController {
  constructor(private readonly profileService: ProfileService) {}

  @Get()
  getProfile(@Req() req: AuthenticatedRequest): ApiResponse<UserProfile> {
    return { data: this.profileService.getProfile(req.user) };
  }

  @Put()
  async updateProfile(
    @Req() req: AuthenticatedRequest,
    @Body() updateProfileDto: UpdateProfileDto,
  ): Promise<ApiResponse<UserProfile>> {
    const profile = await this.profileService.updateProfile(req.user.id, updateProfileDto);
    return { data: profile };
  }
}
