import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { NotFoundException, ConflictException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { User, EventRecord, Registration, serializeInterests } from '@engage/entities';
import { RegistrationService } from './registration.service';
import { UserService } from '../user/user.service';
import { MessageComposerService } from '../messaging/message-composer.service';
import { MessagingService } from '../messaging/messaging.service';
import { MessageType } from '../messaging/message-type';
import { SchedulerEngine } from '../scheduler/scheduler-engine.service';
import {
  NOW,
  HOUR,
  hoursFromNow,
  makeUser,
  makeEvent,
  makeRegistration,
  makeRegistrationRepo,
  RegistrationRepoMock,
} from '../../../test/fixtures';

const MINUTE = 60 * 1000;

describe('RegistrationService', () => {
  let service: RegistrationService;
  let scheduler: SchedulerEngine;
  let user: User;
  let event: EventRecord;
  let registrationRepo: RegistrationRepoMock;
  let eventRepo: { findOne: jest.Mock };
  let userService: { findById: jest.Mock; findByIdOrNull: jest.Mock; updateInterests: jest.Mock };
  let composer: { compose: jest.Mock };
  let messaging: { send: jest.Mock };

  async function createService(restoreOnBoot = false): Promise<void> {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RegistrationService,
        SchedulerEngine,
        SchedulerRegistry,
        { provide: getRepositoryToken(Registration), useValue: registrationRepo },
        { provide: getRepositoryToken(EventRecord), useValue: eventRepo },
        { provide: UserService, useValue: userService },
        { provide: MessageComposerService, useValue: composer },
        { provide: MessagingService, useValue: messaging },
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => (key === 'scheduler' ? { restoreOnBoot } : undefined)) },
        },
      ],
    }).compile();

    service = module.get<RegistrationService>(RegistrationService);
    scheduler = module.get<SchedulerEngine>(SchedulerEngine);
  }

  function useEvent(next: EventRecord): void {
    event = next;
    eventRepo.findOne.mockResolvedValue(event);
  }

  beforeEach(async () => {
    jest.useFakeTimers({ now: NOW });

    user = makeUser();
    event = makeEvent();

    registrationRepo = makeRegistrationRepo();
    eventRepo = { findOne: jest.fn().mockResolvedValue(event) };
    userService = {
      findById: jest.fn(() => Promise.resolve(user)),
      findByIdOrNull: jest.fn(() => Promise.resolve(user)),
      updateInterests: jest.fn((target: User, interests: string[]) => {
        target.interests = serializeInterests(interests);
        return Promise.resolve(target);
      }),
    };
    composer = { compose: jest.fn().mockResolvedValue('Subject: Hello\n\nBody') };
    messaging = { send: jest.fn().mockResolvedValue(true) };

    await createService();
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
  });

  describe('register', () => {
    it('should schedule all five jobs for an event more than 72h away', async () => {
      useEvent(makeEvent({ eventTime: hoursFromNow(100) }));

      const result = await service.register('user-1', 'event-1');

      expect(result.scheduledJobIds).toEqual([
        'preview:user-1:event-1',
        'reminder_24h:user-1:event-1',
        'reminder_1h:user-1:event-1',
        'start:user-1:event-1',
        'follow_up:user-1:event-1',
      ]);
      expect(scheduler.size).toBe(5);
      expect(result.registration.registrationTime).toEqual(NOW);
    });

    it('should skip preview and 24h reminder for an event 10h away', async () => {
      useEvent(makeEvent({ eventTime: hoursFromNow(10) }));

      const result = await service.register('user-1', 'event-1');

      expect(result.scheduledJobIds).toEqual([
        'reminder_1h:user-1:event-1',
        'start:user-1:event-1',
        'follow_up:user-1:event-1',
      ]);
    });

    it('should only schedule start and follow-up inside the last hour', async () => {
      useEvent(makeEvent({ eventTime: new Date(NOW.getTime() + 30 * MINUTE) }));

      const result = await service.register('user-1', 'event-1');

      expect(result.scheduledJobIds).toEqual(['start:user-1:event-1', 'follow_up:user-1:event-1']);
    });

    it('should persist the registration before the welcome message', async () => {
      await service.register('user-1', 'event-1');

      expect(composer.compose).toHaveBeenCalledWith(user, event, MessageType.WELCOME);
      expect(messaging.send).toHaveBeenCalledWith('user-1', 'Subject: Hello\n\nBody');
      expect(registrationRepo.save.mock.invocationCallOrder[0]).toBeLessThan(
        messaging.send.mock.invocationCallOrder[0],
      );
    });

    it('should derive interests from the event name and description', async () => {
      await service.register('user-1', 'event-1');

      expect(userService.updateInterests).toHaveBeenCalledWith(user, ['conference', 'explore', 'future']);
      expect(user.interests).toBe('conference,explore,future');
    });

    it('should merge derived interests with existing ones', async () => {
      user = makeUser({ interests: 'robotics,future' });

      await service.register('user-1', 'event-1');

      expect(user.interests).toBe('conference,explore,future,robotics');
    });

    it('should reject a duplicate registration without scheduling jobs', async () => {
      await service.register('user-1', 'event-1');

      await expect(service.register('user-1', 'event-1')).rejects.toThrow(ConflictException);

      expect(scheduler.size).toBe(5);
      expect(registrationRepo.save).toHaveBeenCalledTimes(1);
      expect(userService.updateInterests).toHaveBeenCalledTimes(1);
    });

    it('should report a concurrent insert as a conflict', async () => {
      registrationRepo.save.mockRejectedValue(
        new QueryFailedError('INSERT', [], Object.assign(new Error('duplicate'), { code: '23505' })),
      );

      await expect(service.register('user-1', 'event-1')).rejects.toThrow(ConflictException);
      expect(scheduler.size).toBe(0);
      expect(messaging.send).not.toHaveBeenCalled();
      expect(userService.updateInterests).not.toHaveBeenCalled();
    });

    it('should update interests only after the registration is saved', async () => {
      await service.register('user-1', 'event-1');

      expect(registrationRepo.save.mock.invocationCallOrder[0]).toBeLessThan(
        userService.updateInterests.mock.invocationCallOrder[0],
      );
    });

    it('should keep the registration when interests cannot be stored', async () => {
      userService.updateInterests.mockRejectedValueOnce(new Error('value too long for type character varying'));

      const result = await service.register('user-1', 'event-1');

      expect(result.scheduledJobIds).toHaveLength(5);
      expect(registrationRepo.remove).not.toHaveBeenCalled();
      expect(messaging.send).toHaveBeenCalledTimes(1);
    });

    it('should leave no jobs behind when cancelled while the welcome message is sending', async () => {
      let releaseSend: (delivered: boolean) => void = () => undefined;
      let sendStarted: () => void = () => undefined;
      const started = new Promise<void>((resolve) => {
        sendStarted = resolve;
      });
      messaging.send.mockImplementationOnce(
        () =>
          new Promise<boolean>((resolve) => {
            releaseSend = resolve;
            sendStarted();
          }),
      );

      const registering = service.register('user-1', 'event-1');
      await started;
      await expect(service.cancel('user-1', 'event-1')).resolves.toBe(true);
      releaseSend(true);

      const result = await registering;
      expect(result.scheduledJobIds).toEqual([]);
      expect(scheduler.size).toBe(0);
      expect(scheduler.listPending()).toEqual([]);
    });

    it('should throw NotFoundException for an unknown event', async () => {
      eventRepo.findOne.mockResolvedValue(null);

      await expect(service.register('user-1', 'missing')).rejects.toThrow(NotFoundException);
      expect(userService.findById).not.toHaveBeenCalled();
    });

    it('should propagate an unknown user', async () => {
      userService.findById.mockRejectedValue(new NotFoundException("User with id 'ghost' not found"));

      await expect(service.register('ghost', 'event-1')).rejects.toThrow(NotFoundException);
      expect(registrationRepo.save).not.toHaveBeenCalled();
    });

    it('should still schedule jobs when the welcome message fails', async () => {
      composer.compose.mockRejectedValueOnce(new Error('composer down'));

      const result = await service.register('user-1', 'event-1');

      expect(result.scheduledJobIds).toHaveLength(5);
      expect(messaging.send).not.toHaveBeenCalled();
    });
  });

  describe('scheduled jobs', () => {
    it('should compose the matching message type when a job fires', async () => {
      await service.register('user-1', 'event-1');
      composer.compose.mockClear();
      messaging.send.mockClear();

      // event at +100h: preview is due at +28h
      jest.advanceTimersByTime(28 * HOUR);
      await scheduler.drain();

      expect(composer.compose).toHaveBeenCalledTimes(1);
      expect(composer.compose).toHaveBeenCalledWith(user, event, MessageType.CONTENT_PREVIEW);
      expect(messaging.send).toHaveBeenCalledWith('user-1', 'Subject: Hello\n\nBody');
      expect(scheduler.has('preview:user-1:event-1')).toBe(false);
    });

    it('should send the start nudge as event_starting', async () => {
      await service.register('user-1', 'event-1');
      composer.compose.mockClear();

      jest.advanceTimersByTime(100 * HOUR);
      await scheduler.drain();

      expect(composer.compose.mock.calls.map((call) => call[2])).toEqual([
        MessageType.CONTENT_PREVIEW,
        MessageType.REMINDER_24H,
        MessageType.REMINDER_1H,
        MessageType.EVENT_STARTING,
      ]);
    });

    it('should skip the message when the event was removed meanwhile', async () => {
      await service.register('user-1', 'event-1');
      composer.compose.mockClear();
      messaging.send.mockClear();
      eventRepo.findOne.mockResolvedValue(null);

      jest.advanceTimersByTime(28 * HOUR);
      await scheduler.drain();

      expect(composer.compose).not.toHaveBeenCalled();
      expect(messaging.send).not.toHaveBeenCalled();
    });

    it('should skip the message when the registration is gone', async () => {
      const result = await service.register('user-1', 'event-1');
      composer.compose.mockClear();
      messaging.send.mockClear();
      await registrationRepo.remove(result.registration);

      jest.advanceTimersByTime(28 * HOUR);
      await scheduler.drain();

      expect(composer.compose).not.toHaveBeenCalled();
      expect(messaging.send).not.toHaveBeenCalled();
    });
  });

  describe('cancel', () => {
    it('should remove every job so a reminder cancelled 5 minutes early never fires', async () => {
      useEvent(makeEvent({ eventTime: hoursFromNow(2) }));
      await service.register('user-1', 'event-1');
      composer.compose.mockClear();

      // reminder_1h is due at +1h
      jest.advanceTimersByTime(55 * MINUTE);
      await expect(service.cancel('user-1', 'event-1')).resolves.toBe(true);

      jest.advanceTimersByTime(10 * MINUTE);
      await scheduler.drain();

      expect(composer.compose).not.toHaveBeenCalled();
      expect(scheduler.size).toBe(0);
      expect(registrationRepo.remove).toHaveBeenCalledTimes(1);
    });

    it('should return false when not registered', async () => {
      await expect(service.cancel('user-1', 'event-1')).resolves.toBe(false);
      expect(registrationRepo.remove).not.toHaveBeenCalled();
    });
  });

  describe('cancelAllForEvent', () => {
    it('should cancel the jobs of every registered user', async () => {
      const other = makeUser({ id: 'user-2', email: 'grace@example.com' });
      await service.register('user-1', 'event-1');
      userService.findById.mockResolvedValueOnce(other);
      await service.register('user-2', 'event-1');
      expect(scheduler.size).toBe(10);

      const registrations = [makeRegistration(user, event), makeRegistration(other, event, 'registration-2')];
      registrationRepo.find.mockResolvedValue(registrations);

      await expect(service.cancelAllForEvent('event-1')).resolves.toBe(2);

      expect(scheduler.size).toBe(0);
      expect(registrationRepo.find).toHaveBeenCalledWith({ where: { eventId: 'event-1' } });
      expect(registrationRepo.remove).toHaveBeenCalledWith(registrations);
    });

    it('should do nothing for an event without registrations', async () => {
      await expect(service.cancelAllForEvent('event-1')).resolves.toBe(0);
      expect(registrationRepo.remove).not.toHaveBeenCalled();
    });
  });

  describe('restoreScheduledJobs', () => {
    it('should re-plan jobs for stored registrations', async () => {
      const future = makeEvent({ id: 'event-1', eventTime: hoursFromNow(100) });
      const justStarted = makeEvent({ id: 'event-2', eventTime: hoursFromNow(-1) });
      registrationRepo.find.mockResolvedValue([
        makeRegistration(user, future),
        makeRegistration(user, justStarted, 'registration-2'),
      ]);

      await expect(service.restoreScheduledJobs(NOW)).resolves.toBe(6);
      expect(scheduler.has('follow_up:user-1:event-2')).toBe(true);

      // Already pending: nothing new
      await expect(service.restoreScheduledJobs(NOW)).resolves.toBe(0);
    });

    it('should not restore on bootstrap when disabled', async () => {
      await service.onApplicationBootstrap();

      expect(registrationRepo.find).not.toHaveBeenCalled();
    });

    it('should restore on bootstrap when enabled', async () => {
      scheduler.stop();
      await createService(true);
      registrationRepo.find.mockResolvedValue([makeRegistration(user, event)]);

      await service.onApplicationBootstrap();

      expect(scheduler.size).toBe(5);
    });
  });
});
