export * from './user.entity';
export * from './event.entity';
export * from './registration.entity';
