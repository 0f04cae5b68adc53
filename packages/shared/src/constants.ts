// API paths
export const API_PREFIX = '/api/v1';

// Default pagination
export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 100;

// Chat: longest context handed to the intent extractor (characters)
export const CHAT_CONTEXT_MAX_LENGTH = 3000;

// Interest derivation: tokens this long or shorter are dropped
export const INTEREST_MAX_DISCARDED_LENGTH = 2;

// Event import: longest page text handed to the LLM (characters)
export const IMPORT_TEXT_MAX_LENGTH = 4000;
