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
 * A scheduled webinar or event users can register for.
 *
 * Engagement jobs are planned from `eventTime` at registration time.
 * Changing `eventTime` later does not move jobs that are already planned.
 */
@Entity('events')
export class EventRecord {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  @Index()
  name!: string;

  @Column({ type: 'text' })
  description!: string;

  /** Start instant (UTC) */
  @Column({ name: 'event_time', type: 'timestamp with time zone' })
  @Index()
  eventTime!: Date;

  @Column({ type: 'varchar', name: 'image_url', length: 1024, nullable: true })
  imageUrl!: string | null;

  @Column({ type: 'varchar', name: 'recording_url', length: 1024, nullable: true })
  recordingUrl!: string | null;

  @OneToMany(() => Registration, (registration) => registration.event)
  registrations!: Registration[];

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at' })
  updatedAt!: Date;
}
