import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
  Unique,
} from 'typeorm';

/**
 * Correlation ids handed out by the match provider when a user's selfie was
 * submitted for an event. Written once, never updated.
 */
@Entity('event_registrations')
@Unique('uq_event_registrations_user_event', ['userId', 'externalEventId'])
export class EventRegistrationEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_event_registrations_user')
  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Index('idx_event_registrations_external_event')
  @Column({ name: 'external_event_id', type: 'integer' })
  externalEventId!: number;

  @Column({ name: 'request_id', type: 'integer' })
  requestId!: number;

  @Column({ name: 'request_key', type: 'varchar', length: 255 })
  requestKey!: string;

  @Column({ name: 'redirect_url', type: 'text', nullable: true })
  redirectUrl!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
