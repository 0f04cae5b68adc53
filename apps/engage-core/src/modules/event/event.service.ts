import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { ILike, MoreThanOrEqual, Repository } from 'typeorm';
import { EventRecord } from '@engage/entities';
import { PaginatedResponse, DEFAULT_LIMIT } from '@engage/shared';
import { RegistrationService } from '../registration/registration.service';
import { CreateEventDto } from './dto/create-event.dto';
import { UpdateEventDto } from './dto/update-event.dto';

export interface ListEventsOptions {
  upcoming?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
}

@Injectable()
export class EventService {
  private readonly logger = new Logger(EventService.name);

  constructor(
    @InjectRepository(EventRecord)
    private readonly eventRepo: Repository<EventRecord>,
    private readonly registrationService: RegistrationService,
  ) {}

  async findAll(options: ListEventsOptions = {}): Promise<PaginatedResponse<EventRecord>> {
    const { upcoming, search, limit = DEFAULT_LIMIT, offset = 0 } = options;

    const qb = this.eventRepo
      .createQueryBuilder('event')
      .orderBy('event.eventTime', 'ASC')
      .take(limit)
      .skip(offset);

    if (upcoming) {
      qb.andWhere('event.eventTime >= :now', { now: new Date() });
    }

    if (search) {
      qb.andWhere('event.name ILIKE :search', { search: `%${escapeLike(search)}%` });
    }

    const [items, total] = await qb.getManyAndCount();
    return { items, total, limit, offset };
  }

  /**
   * Events starting now or later, earliest first.
   */
  async findUpcoming(limit = DEFAULT_LIMIT): Promise<EventRecord[]> {
    return this.eventRepo.find({
      where: { eventTime: MoreThanOrEqual(new Date()) },
      order: { eventTime: 'ASC' },
      take: limit,
    });
  }

  async findOne(id: string): Promise<EventRecord> {
    const event = await this.eventRepo.findOne({ where: { id } });
    if (!event) {
      throw new NotFoundException(`Event with id '${id}' not found`);
    }
    return event;
  }

  /**
   * Case-insensitive substring match on the event name. When several events
   * match, the one starting earliest wins.
   */
  async findByName(name: string): Promise<EventRecord | null> {
    const needle = name.trim();
    if (!needle) {
      return null;
    }

    return this.eventRepo.findOne({
      where: { name: ILike(`%${escapeLike(needle)}%`) },
      order: { eventTime: 'ASC' },
    });
  }

  async create(dto: CreateEventDto): Promise<EventRecord> {
    const event = this.eventRepo.create({
      name: dto.name,
      description: dto.description,
      eventTime: dto.eventTime,
      imageUrl: dto.imageUrl ?? null,
      recordingUrl: dto.recordingUrl ?? null,
    });

    const saved = await this.eventRepo.save(event);
    this.logger.log(`Created event ${saved.id} "${saved.name}" at ${saved.eventTime.toISOString()}`);
    return saved;
  }

  async update(id: string, dto: UpdateEventDto): Promise<EventRecord> {
    const event = await this.findOne(id);

    if (dto.eventTime !== undefined && dto.eventTime.getTime() !== event.eventTime.getTime()) {
      this.logger.warn(`Event ${id} moved to ${dto.eventTime.toISOString()}; scheduled jobs keep their times`);
    }

    if (dto.name !== undefined) event.name = dto.name;
    if (dto.description !== undefined) event.description = dto.description;
    if (dto.eventTime !== undefined) event.eventTime = dto.eventTime;
    if (dto.imageUrl !== undefined) event.imageUrl = dto.imageUrl;
    if (dto.recordingUrl !== undefined) event.recordingUrl = dto.recordingUrl;

    return this.eventRepo.save(event);
  }

  /**
   * Delete an event. Every registration is cancelled first, which removes
   * its pending jobs.
   */
  async remove(id: string): Promise<{ deleted: true; cancelledRegistrations: number }> {
    const event = await this.findOne(id);

    const cancelledRegistrations = await this.registrationService.cancelAllForEvent(event.id);
    await this.eventRepo.remove(event);

    this.logger.log(`Deleted event ${id} (${cancelledRegistrations} registrations cancelled)`);
    return { deleted: true, cancelledRegistrations };
  }
}

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}
