import { UserEntity } from '../users/entities/user.entity';
import { EventEntity } from '../events/entities/event.entity';
import { EventRegistrationEntity } from '../registrations/entities/event-registration.entity';
import { ImageEntity } from '../images/entities/image.entity';
import { RegionMappingEntity } from '../region-mappings/entities/region-mapping.entity';
import { UserSocialPostEntity } from '../social-posts/entities/user-social-post.entity';

export const ENTITIES = [
  UserEntity,
  EventEntity,
  EventRegistrationEntity,
  ImageEntity,
  RegionMappingEntity,
  UserSocialPostEntity,
];
