import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

@Entity('images')
export class ImageEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Index('idx_images_user')
  @Column({ name: 'user_id', type: 'integer', nullable: true })
  userId!: number | null;

  @Index('idx_images_event')
  @Column({ name: 'event_id', type: 'integer', nullable: true })
  eventId!: number | null;

  @Index('idx_images_external_image')
  @Column({ name: 'external_image_id', type: 'integer', nullable: true })
  externalImageId!: number | null;

  @Column({ name: 'external_image_url', type: 'varchar', length: 500, nullable: true })
  externalImageUrl!: string | null;

  // Content-addressed mirror copy
  @Column({ name: 'mirror_url', type: 'varchar', length: 500, nullable: true })
  mirrorUrl!: string | null;

  @Column({ name: 'mirror_cid', type: 'varchar', length: 255, nullable: true })
  mirrorCid!: string | null;

  @Column({ type: 'integer', nullable: true })
  size!: number | null;

  @Column({ type: 'integer', nullable: true })
  height!: number | null;

  @Column({ type: 'integer', nullable: true })
  width!: number | null;

  @Column({ type: 'varchar', length: 512, nullable: true })
  description!: string | null;

  @Column({ name: 'image_encoding', type: 'varchar', length: 512, nullable: true })
  imageEncoding!: string | null;

  @Index('idx_images_created_at')
  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
