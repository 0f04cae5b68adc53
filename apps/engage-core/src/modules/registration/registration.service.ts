import {
  Injectable,
  Logger,
  NotFoundException,
  ConflictException,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { MoreThan, MoreThanOrEqual, Repository } from 'typeorm';
import { User, EventRecord, Registration, parseInterests } from '@engage/entities';
import { SchedulerConfig } from '../../common/config/scheduler.config';
import { extractKeywords, mergeKeywords } from '../../common/utils/keywords.utils';
import { isUniqueViolation } from '../../common/utils/db-errors.utils';
import { UserService } from '../user/user.service';
import { MessageComposerService } from '../messaging/message-composer.service';
import { MessagingService } from '../messaging/messaging.service';
import { MessageType, MESSAGE_TYPE_FOR_JOB } from '../messaging/message-type';
import { SchedulerEngine } from '../scheduler/scheduler-engine.service';
import { JobKind, ALL_JOB_KINDS } from '../scheduler/engagement-job.types';
import { buildJobId } from '../scheduler/job-id';
import { planJobs, JOB_OFFSETS_MS } from '../scheduler/offset-planner';

export interface RegistrationResult {
  registration: Registration;
  user: User;
  event: EventRecord;
  scheduledJobIds: string[];
}

/**
 * Registration and cancellation workflows.
 *
 * Register: validate, persist the row, update interests, send the welcome
 * message, then schedule the engagement jobs if the row is still there.
 * Cancel: remove the jobs, then the row. Message text for scheduled jobs is composed when the job fires,
 * from the user and event as they are at that moment.
 */
@Injectable()
export class RegistrationService implements OnApplicationBootstrap {
  private readonly logger = new Logger(RegistrationService.name);
  private readonly restoreOnBoot: boolean;

  constructor(
    @InjectRepository(Registration)
    private readonly registrationRepo: Repository<Registration>,
    @InjectRepository(EventRecord)
    private readonly eventRepo: Repository<EventRecord>,
    private readonly userService: UserService,
    private readonly composer: MessageComposerService,
    private readonly messagingService: MessagingService,
    private readonly scheduler: SchedulerEngine,
    configService: ConfigService,
  ) {
    this.restoreOnBoot = configService.get<SchedulerConfig>('scheduler')?.restoreOnBoot ?? true;
  }

  async onApplicationBootstrap(): Promise<void> {
    if (!this.restoreOnBoot) {
      return;
    }
    const restored = await this.restoreScheduledJobs();
    this.logger.log(`Restored ${restored} engagement jobs from stored registrations`);
  }

  /**
   * @throws NotFoundException when the event or user does not exist
   * @throws ConflictException when the user is already registered
   */
  async register(userId: string, eventId: string): Promise<RegistrationResult> {
    const event = await this.eventRepo.findOne({ where: { id: eventId } });
    if (!event) {
      throw new NotFoundException(`Event with id '${eventId}' not found`);
    }
    const user = await this.userService.findById(userId);

    const existing = await this.registrationRepo.findOne({ where: { userId, eventId } });
    if (existing) {
      throw new ConflictException(`Already registered for "${event.name}"`);
    }

    let registration: Registration;
    try {
      registration = await this.registrationRepo.save(
        this.registrationRepo.create({ userId, eventId, registrationTime: new Date() }),
      );
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictException(`Already registered for "${event.name}"`);
      }
      throw error;
    }

    this.logger.log(`User ${user.email} registered for "${event.name}"`);

    await this.recordInterests(user, event);
    await this.sendWelcome(user, event);

    // A cancel may have removed the row while the welcome message was in flight
    if (!(await this.isRegistered(userId, eventId))) {
      this.logger.warn(`Registration of ${user.email} for "${event.name}" was cancelled before scheduling`);
      return { registration, user, event, scheduledJobIds: [] };
    }
    const scheduledJobIds = this.scheduleJobs(userId, event);

    return { registration, user, event, scheduledJobIds };
  }

  /**
   * @returns false when the user is not registered for the event
   */
  async cancel(userId: string, eventId: string): Promise<boolean> {
    const registration = await this.registrationRepo.findOne({ where: { userId, eventId } });
    if (!registration) {
      return false;
    }

    let cancelled = this.cancelJobs(userId, eventId);
    await this.registrationRepo.remove(registration);
    // Jobs scheduled by a register call that was still finishing
    cancelled += this.cancelJobs(userId, eventId);

    this.logger.log(`User ${userId} cancelled event ${eventId} (${cancelled} jobs removed)`);
    return true;
  }

  /**
   * Cancel every registration for an event. Used before deleting the event.
   *
   * @returns number of registrations cancelled
   */
  async cancelAllForEvent(eventId: string): Promise<number> {
    const registrations = await this.registrationRepo.find({ where: { eventId } });

    for (const registration of registrations) {
      this.cancelJobs(registration.userId, eventId);
    }
    if (registrations.length > 0) {
      await this.registrationRepo.remove(registrations);
    }

    return registrations.length;
  }

  /**
   * The user's registrations for events that have not started, earliest first.
   */
  async listUpcoming(userId: string): Promise<Registration[]> {
    return this.registrationRepo.find({
      where: { userId, event: { eventTime: MoreThanOrEqual(new Date()) } },
      relations: { event: true },
      order: { event: { eventTime: 'ASC' } },
    });
  }

  /**
   * Re-plan jobs for stored registrations whose follow-up has not fired yet.
   * Job ids are deterministic, so jobs already pending are left alone.
   */
  async restoreScheduledJobs(now = new Date()): Promise<number> {
    const horizon = new Date(now.getTime() - JOB_OFFSETS_MS[JobKind.FOLLOW_UP]);
    const registrations = await this.registrationRepo.find({
      where: { event: { eventTime: MoreThan(horizon) } },
      relations: { event: true },
    });

    let restored = 0;
    for (const registration of registrations) {
      restored += this.scheduleJobs(registration.userId, registration.event, now).length;
    }
    return restored;
  }

  /**
   * Merge keywords from the event into the user's interests. Interests are
   * derived data, so a failure here is logged and the registration stands.
   */
  private async recordInterests(user: User, event: EventRecord): Promise<void> {
    const interests = mergeKeywords(
      parseInterests(user.interests),
      extractKeywords(`${event.name} ${event.description}`),
    );
    try {
      await this.userService.updateInterests(user, interests);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not update interests of ${user.email}: ${message}`);
    }
  }

  private async isRegistered(userId: string, eventId: string): Promise<boolean> {
    const registration = await this.registrationRepo.findOne({ where: { userId, eventId } });
    return registration !== null;
  }

  private async sendWelcome(user: User, event: EventRecord): Promise<void> {
    try {
      const text = await this.composer.compose(user, event, MessageType.WELCOME);
      const delivered = await this.messagingService.send(user.id, text);
      if (!delivered) {
        this.logger.warn(`Welcome message for ${user.email} was not delivered`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Welcome message for ${user.email} failed: ${message}`);
    }
  }

  private scheduleJobs(userId: string, event: EventRecord, now = new Date()): string[] {
    const scheduled: string[] = [];

    for (const job of planJobs(event.eventTime, now)) {
      const jobId = buildJobId(job.kind, userId, event.id);
      if (this.scheduler.schedule(jobId, job.dueTime, () => this.runJob(job.kind, userId, event.id))) {
        scheduled.push(jobId);
      }
    }

    return scheduled;
  }

  private cancelJobs(userId: string, eventId: string): number {
    let cancelled = 0;
    for (const kind of ALL_JOB_KINDS) {
      if (this.scheduler.cancel(buildJobId(kind, userId, eventId))) {
        cancelled++;
      }
    }
    return cancelled;
  }

  /**
   * Body of a scheduled job: reload, check the registration, compose, send.
   */
  private async runJob(kind: JobKind, userId: string, eventId: string): Promise<void> {
    const [user, event, registered] = await Promise.all([
      this.userService.findByIdOrNull(userId),
      this.eventRepo.findOne({ where: { id: eventId } }),
      this.isRegistered(userId, eventId),
    ]);
    if (!user || !event) {
      this.logger.warn(`Skipping ${kind} job: user ${userId} or event ${eventId} no longer exists`);
      return;
    }
    if (!registered) {
      this.logger.warn(`Skipping ${kind} job: user ${userId} is no longer registered for event ${eventId}`);
      return;
    }

    const text = await this.composer.compose(user, event, MESSAGE_TYPE_FOR_JOB[kind]);
    const delivered = await this.messagingService.send(user.id, text);
    this.logger.log(`${kind} message for ${user.email} ${delivered ? 'sent' : 'not delivered'}`);
  }
}
