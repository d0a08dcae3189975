import { UserEntity } from './entities/user.entity';

export interface UserProfilePatch {
  email?: string | null;
  instagramUrl?: string | null;
  twitterUrl?: string | null;
  linkedinUrl?: string | null;
  description?: string | null;
  interests?: string | null;
}

/**
 * Copies the fields present in `patch` onto `user`. Absent fields are left alone;
 * an explicit null clears the value.
 */
export function applyUserProfilePatch(user: UserEntity, patch: UserProfilePatch): UserEntity {
  if (patch.email !== undefined) user.email = patch.email;
  if (patch.instagramUrl !== undefined) user.instagramUrl = patch.instagramUrl;
  if (patch.twitterUrl !== undefined) user.twitterUrl = patch.twitterUrl;
  if (patch.linkedinUrl !== undefined) user.linkedinUrl = patch.linkedinUrl;
  if (patch.description !== undefined) user.description = patch.description;
  if (patch.interests !== undefined) user.interests = patch.interests;
  return user;
}
