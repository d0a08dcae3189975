import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('events')
export class EventEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'cover_image_url', type: 'varchar', length: 500, nullable: true })
  coverImageUrl!: string | null;

  @Column({ name: 'cover_image_height', type: 'integer', nullable: true })
  coverImageHeight!: number | null;

  @Column({ name: 'cover_image_width', type: 'integer', nullable: true })
  coverImageWidth!: number | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  location!: string | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  category!: string | null;

  // YYYY-MM-DD
  @Column({ name: 'event_date', type: 'date', nullable: true })
  eventDate!: string | null;

  /** Event id on the match provider side. */
  @Column({ name: 'external_event_id', type: 'integer', unique: true })
  externalEventId!: number;

  /** Opaque key the match provider requires for every call about this event. */
  @Column({ name: 'external_event_key', type: 'varchar', length: 255, nullable: true })
  externalEventKey!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
