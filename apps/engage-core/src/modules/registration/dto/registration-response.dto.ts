import { Registration, EventRecord } from '@engage/entities';

export interface RegistrationView {
  id: string;
  registrationTime: string;
  event: {
    id: string;
    name: string;
    eventTime: string;
  };
}

export interface RegisterResponse {
  registrationId: string;
  eventId: string;
  scheduledJobIds: string[];
}

export function toRegistrationView(registration: Registration, event: EventRecord): RegistrationView {
  return {
    id: registration.id,
    registrationTime: registration.registrationTime.toISOString(),
    event: {
      id: event.id,
      name: event.name,
      eventTime: event.eventTime.toISOString(),
    },
  };
}
