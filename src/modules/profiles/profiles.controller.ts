import { Body, Controller, Get, Param, Patch } from '@nestjs/common';

import { Public } from '../auth/public.decorator';
import { CurrentUserId } from '../auth/current-user.decorator';
import type { ProfileRecord } from '../../domain/models/account.model';
import { ProfilesService } from './profiles.service';
import { UpdateProfileDto } from './dto/update-profile.dto';

@Controller('profiles')
export class ProfilesController {
  constructor(private readonly profilesService: ProfilesService) {}

  /**
   * Public profile
   * GET /profiles/{userId}
   */
  @Public()
  @Get(':id')
  async getProfile(@Param('id') id: string): Promise<ProfileRecord> {
    return this.profilesService.getProfile(id);
  }

  /**
   * Update own profile
   * PATCH /profiles/{userId}
   * Body: { username?, avatar_url? }
   */
  @Patch(':id')
  async updateProfile(
    @CurrentUserId() actorId: string,
    @Param('id') id: string,
    @Body() dto: UpdateProfileDto
  ): Promise<ProfileRecord> {
    return this.profilesService.updateProfile(actorId, id, dto);
  }
}
