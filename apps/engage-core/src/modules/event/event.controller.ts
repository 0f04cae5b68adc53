import {
  Controller,
  Get,
  Post,
  Patch,
  Delete,
  Param,
  Query,
  Body,
  ParseUUIDPipe,
  UseGuards,
} from '@nestjs/common';
import { EventRecord } from '@engage/entities';
import { PaginatedResponse } from '@engage/shared';
import { Public } from '../../common/decorators';
import { AdminGuard } from '../../common/guards/admin.guard';
import { EventService } from './event.service';
import { EventImportService } from './event-import.service';
import {
  CreateEventDto,
  UpdateEventDto,
  ListEventsQueryDto,
  ImportEventDto,
  ImportedEventDraft,
} from './dto';

@Controller('events')
export class EventController {
  constructor(
    private readonly eventService: EventService,
    private readonly importService: EventImportService,
  ) {}

  @Public()
  @Get()
  async findAll(@Query() query: ListEventsQueryDto): Promise<PaginatedResponse<EventRecord>> {
    return this.eventService.findAll(query);
  }

  @Public()
  @Get(':id')
  async findOne(@Param('id', ParseUUIDPipe) id: string): Promise<EventRecord> {
    return this.eventService.findOne(id);
  }

  @Post()
  @UseGuards(AdminGuard)
  async create(@Body() dto: CreateEventDto): Promise<EventRecord> {
    return this.eventService.create(dto);
  }

  /**
   * Extract an event from a web page. Returns the draft, or the created
   * event when `save` is set.
   */
  @Post('import')
  @UseGuards(AdminGuard)
  async importFromUrl(@Body() dto: ImportEventDto): Promise<ImportedEventDraft | EventRecord> {
    const draft = await this.importService.importFromUrl(dto.url);
    if (!dto.save) {
      return draft;
    }
    return this.eventService.create({
      name: draft.name,
      description: draft.description,
      eventTime: new Date(draft.eventTime),
    });
  }

  @Patch(':id')
  @UseGuards(AdminGuard)
  async update(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateEventDto,
  ): Promise<EventRecord> {
    return this.eventService.update(id, dto);
  }

  /**
   * Delete an event and cancel every registration for it.
   */
  @Delete(':id')
  @UseGuards(AdminGuard)
  async remove(@Param('id', ParseUUIDPipe) id: string) {
    return this.eventService.remove(id);
  }
}
