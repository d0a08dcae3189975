import { Controller, Post, Body, UseGuards, Req, HttpCode, HttpStatus } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { AuthService } from './auth.service';
import { RegisterDto } from './dto/register.dto';
import { toUserProfile } from '../users/users.service';
import { AuthenticatedRequest } from '../common/interfaces/authenticated-request';
import { ApiResponse, UserProfile } from '@shared/types';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('register')
  async register(@Body() registerDto: RegisterDto): Promise<ApiResponse<UserProfile>> {
    const user = await this.authService.register(registerDto);
    return { data: toUserProfile(user) };
  }

  @UseGuards(AuthGuard('basic'))
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(
    @Req() req: AuthenticatedRequest,
  ): Promise<ApiResponse<{ message: string; user: UserProfile }>> {
    return {
      data: {
        message: 'login successful',
        user: toUserProfile(req.user),
      },
    };
  }
}
