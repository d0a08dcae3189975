import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
  Unique,
} from 'typeorm';

@Entity('user_social_posts')
@Unique('uq_user_social_posts_user_code', ['userId', 'code'])
export class UserSocialPostEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('idx_user_social_posts_user')
  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({ type: 'varchar', length: 100 })
  code!: string;

  @Column({ type: 'text', nullable: true })
  caption!: string | null;

  // Unix seconds as reported by the provider
  @Column({ name: 'posted_at', type: 'integer', nullable: true })
  postedAt!: number | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
