import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity('users')
export class UserEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50, unique: true })
  username!: string;

  @Column({ type: 'varchar', length: 100, unique: true, nullable: true })
  email!: string | null;

  @Column({ name: 'password_hash', type: 'varchar', length: 255 })
  passwordHash!: string;

  // Selfie fields are only written by image ingestion (isSelfie)
  @Column({ name: 'selfie_url', type: 'varchar', length: 500, nullable: true })
  selfieUrl!: string | null;

  @Column({ name: 'selfie_cid', type: 'varchar', length: 100, nullable: true })
  selfieCid!: string | null;

  @Column({ name: 'selfie_height', type: 'integer', nullable: true })
  selfieHeight!: number | null;

  @Column({ name: 'selfie_width', type: 'integer', nullable: true })
  selfieWidth!: number | null;

  @Column({ name: 'instagram_url', type: 'varchar', length: 200, nullable: true })
  instagramUrl!: string | null;

  @Column({ name: 'twitter_url', type: 'varchar', length: 200, nullable: true })
  twitterUrl!: string | null;

  @Column({ name: 'linkedin_url', type: 'varchar', length: 200, nullable: true })
  linkedinUrl!: string | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'text', nullable: true })
  interests!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
