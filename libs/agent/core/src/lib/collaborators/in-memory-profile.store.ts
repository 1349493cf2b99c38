import { Injectable } from '@nestjs/common';
import { ProfileContext } from '@career-agent/shared/types';
import { ProfileStore } from '../interfaces';

@Injectable()
export class InMemoryProfileStore implements ProfileStore {
  private profiles = new Map<string, ProfileContext>();

  async findProfile(userId: string): Promise<ProfileContext | null> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  async saveProfile(userId: string, profile: ProfileContext): Promise<ProfileContext> {
    const stored = { ...profile, updatedAt: new Date().toISOString() };
    this.profiles.set(userId, stored);
    return { ...stored };
  }
}
