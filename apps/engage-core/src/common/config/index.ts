export { default as appConfig } from './app.config';
export { default as authConfig } from './auth.config';
export { default as databaseConfig } from './database.config';
export { default as llmConfig } from './llm.config';
export { default as messagingConfig } from './messaging.config';
export { default as schedulerConfig } from './scheduler.config';
