import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  OneToMany,
} from 'typeorm';
import { Registration } from './registration.entity';

/**
 * Channel used to reach a user. Stored as plain varchar so legacy or unknown
 * values survive; anything that is not WHATSAPP is delivered by email.
 */
export enum ContactPreference {
  EMAIL = 'email',
  WHATSAPP = 'whatsapp',
}

/** Separator of the persisted interests column. */
export const INTERESTS_SEPARATOR = ',';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ unique: true, length: 255 })
  @Index()
  email!: string;

  @Column({ name: 'password_hash', length: 255 })
  passwordHash!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ type: 'varchar', name: 'job_title', length: 255, nullable: true })
  jobTitle!: string | null;

  /**
   * Lowercase keywords joined with INTERESTS_SEPARATOR.
   * Derived data: rewritten on every registration, grows without bound.
   */
  @Column({ type: 'text', nullable: true })
  interests!: string | null;

  @Column({
    type: 'varchar',
    name: 'contact_preference',
    length: 50,
    default: ContactPreference.EMAIL,
  })
  contactPreference!: string;

  @Column({ type: 'varchar', name: 'phone_number', length: 50, nullable: true })
  phoneNumber!: string | null;

  @Column({ type: 'varchar', name: 'profile_image_url', length: 1024, nullable: true })
  profileImageUrl!: string | null;

  @Column({ name: 'is_admin', default: false })
  isAdmin!: boolean;

  @OneToMany(() => Registration, (registration) => registration.user)
  registrations!: Registration[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}

/**
 * Split the persisted interests column into a keyword list.
 */
export function parseInterests(value: string | null | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(INTERESTS_SEPARATOR)
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
}

/**
 * Serialize keywords for the interests column: lowercase, deduplicated, sorted.
 */
export function serializeInterests(values: Iterable<string>): string | null {
  const unique = new Set<string>();
  for (const value of values) {
    const normalized = value.trim().toLowerCase();
    if (normalized) {
      unique.add(normalized);
    }
  }
  if (unique.size === 0) {
    return null;
  }
  return [...unique].sort().join(INTERESTS_SEPARATOR);
}
