import { User, EventRecord, Registration, ContactPreference } from '@engage/entities';

export const NOW = new Date('2026-03-01T12:00:00.000Z');
export const HOUR = 60 * 60 * 1000;

export function hoursFromNow(hours: number): Date {
  return new Date(NOW.getTime() + hours * HOUR);
}

export function makeUser(overrides: Partial<User> = {}): User {
  return Object.assign(new User(), {
    id: 'user-1',
    email: 'ada@example.com',
    passwordHash: 'hashed-password',
    name: 'Ada',
    jobTitle: 'Engineer',
    interests: null,
    contactPreference: ContactPreference.EMAIL,
    phoneNumber: null,
    profileImageUrl: null,
    isAdmin: false,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  });
}

export function makeEvent(overrides: Partial<EventRecord> = {}): EventRecord {
  return Object.assign(new EventRecord(), {
    id: 'event-1',
    name: 'AI Conference',
    description: 'Explore the future of AI',
    eventTime: hoursFromNow(100),
    imageUrl: null,
    recordingUrl: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  });
}

export function makeRegistration(user: User, event: EventRecord, id = 'registration-1'): Registration {
  return Object.assign(new Registration(), {
    id,
    userId: user.id,
    user,
    eventId: event.id,
    event,
    registrationTime: NOW,
  });
}

export interface RegistrationRepoMock {
  findOne: jest.Mock;
  find: jest.Mock;
  create: jest.Mock;
  save: jest.Mock;
  remove: jest.Mock;
}

/**
 * Registration repository fake that keeps saved rows, keyed by user and event,
 * so a remove is seen by later lookups.
 */
export function makeRegistrationRepo(): RegistrationRepoMock {
  const rows = new Map<string, Registration>();
  const keyOf = (row: { userId: string; eventId: string }): string => `${row.userId}:${row.eventId}`;

  return {
    findOne: jest.fn(({ where }: { where: { userId: string; eventId: string } }) =>
      Promise.resolve(rows.get(keyOf(where)) ?? null),
    ),
    find: jest.fn().mockResolvedValue([]),
    create: jest.fn((data: Partial<Registration>) => Object.assign(new Registration(), data)),
    save: jest.fn((registration: Registration) => {
      const saved = Object.assign(registration, { id: `registration-${rows.size + 1}` });
      rows.set(keyOf(saved), saved);
      return Promise.resolve(saved);
    }),
    remove: jest.fn((target: Registration | Registration[]) => {
      for (const row of Array.isArray(target) ? target : [target]) {
        rows.delete(keyOf(row));
      }
      return Promise.resolve(target);
    }),
  };
}
