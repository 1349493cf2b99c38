import {
  Body,
  Controller,
  Get,
  Inject,
  Logger,
  NotFoundException,
  Param,
  Put,
} from '@nestjs/common';
import { ProfileContext } from '@career-agent/shared/types';
import { PROFILE_STORE, ProfileStore } from '@career-agent/agent/core';
import { ProfileRequestDto, profileRequestSchema } from './dto';
import { ZodValidationPipe } from './pipes/zod-validation.pipe';

/**
 * Profile context used to enrich handler input
 */
@Controller('api/profiles')
export class ProfileController {
  private readonly logger = new Logger(ProfileController.name);

  constructor(@Inject(PROFILE_STORE) private readonly profiles: ProfileStore) {}

  @Put(':userId')
  async saveProfile(
    @Param('userId') userId: string,
    @Body(new ZodValidationPipe(profileRequestSchema)) body: ProfileRequestDto
  ): Promise<ProfileContext> {
    this.logger.log(`[${userId}] Profile stored (${Object.keys(body).length} fields)`);
    return this.profiles.saveProfile(userId, body);
  }

  @Get(':userId')
  async getProfile(@Param('userId') userId: string): Promise<ProfileContext> {
    const profile = await this.profiles.findProfile(userId);
    if (!profile) {
      throw new NotFoundException(`No profile stored for user ${userId}`);
    }
    return profile;
  }
}
