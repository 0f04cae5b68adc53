/**
 * Single source of truth for all TypeORM entities.
 * Imported by:
 * - data-source.ts (CLI migrations)
 * - database.config.ts (NestJS runtime)
 */
import { User, EventRecord, Registration } from '@engage/entities';

export const ALL_ENTITIES = [User, EventRecord, Registration] as const;
