export * from './create-event.dto';
export * from './update-event.dto';
export * from './list-events-query.dto';
export * from './import-event.dto';
