import { DataSource } from 'typeorm';

import { UserEntity } from '../src/users/entities/user.entity';
import { EventEntity } from '../src/events/entities/event.entity';
import { ImageEntity } from '../src/images/entities/image.entity';

// Rows are read back so every nullable column is present as null

export async function saveUser(dataSource: DataSource, fields: Partial<UserEntity> = {}): Promise<UserEntity> {
  const users = dataSource.getRepository(UserEntity);
  const { id } = await users.save(
    users.create({ username: 'alice', passwordHash: 'test-hash', ...fields }),
  );
  return users.findOneByOrFail({ id });
}

export async function saveEvent(dataSource: DataSource, fields: Partial<EventEntity> = {}): Promise<EventEntity> {
  const events = dataSource.getRepository(EventEntity);
  const { id } = await events.save(
    events.create({ name: 'City Marathon', externalEventId: 1413, externalEventKey: 'event-key', ...fields }),
  );
  return events.findOneByOrFail({ id });
}

export async function saveImage(dataSource: DataSource, fields: Partial<ImageEntity> = {}): Promise<ImageEntity> {
  const images = dataSource.getRepository(ImageEntity);
  const { id } = await images.save(images.create({ name: 'photo.jpg', ...fields }));
  return images.findOneByOrFail({ id });
}
