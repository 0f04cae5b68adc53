import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Index,
  Unique,
} from 'typeorm';
import { User } from './user.entity';
import { EventRecord } from './event.entity';

/**
 * Registration: one user attending one event.
 *
 * The (user_id, event_id) pair is unique. The registration workflow checks for
 * an existing row before inserting so callers get "already registered" rather
 * than a storage error; the constraint only catches concurrent inserts.
 */
@Entity('registrations')
@Unique('uq_registration_user_event', ['userId', 'eventId'])
@Index('idx_registrations_event', ['eventId'])
export class Registration {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ name: 'user_id', type: 'uuid' })
  userId!: string;

  @ManyToOne(() => User, (user) => user.registrations, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user!: User;

  @Column({ name: 'event_id', type: 'uuid' })
  eventId!: string;

  @ManyToOne(() => EventRecord, (event) => event.registrations, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'event_id' })
  event!: EventRecord;

  @Column({ name: 'registration_time', type: 'timestamp with time zone' })
  registrationTime!: Date;
}
