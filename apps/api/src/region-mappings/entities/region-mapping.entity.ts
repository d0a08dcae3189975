import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Unique,
} from 'typeorm';

/**
 * Crop/region of a provider image for one match request. Identity is
 * (eventId, indexNum, requestId).
 */
@Entity('region_mappings')
@Unique('uq_region_mappings_event_index_request', ['eventId', 'indexNum', 'requestId'])
export class RegionMappingEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'event_id', type: 'integer' })
  eventId!: number;

  @Column({ name: 'request_id', type: 'integer' })
  requestId!: number;

  @Column({ name: 'image_id', type: 'integer' })
  imageId!: number;

  @Column({ name: 'index_num', type: 'integer' })
  indexNum!: number;

  @Column({ type: 'real', nullable: true })
  x1!: number | null;

  @Column({ type: 'real', nullable: true })
  x2!: number | null;

  @Column({ type: 'real', nullable: true })
  y1!: number | null;

  @Column({ type: 'real', nullable: true })
  y2!: number | null;

  @Column({ name: 'aspect_ratio', type: 'real', nullable: true })
  aspectRatio!: number | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
