// Pagination
export interface PaginatedResponse<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

// Engagement scheduler inspection
export interface PendingJobView {
  jobId: string;
  kind: string | null;
  userId: string | null;
  eventId: string | null;
  dueTime: string;
}

// Chat
export interface ChatReply {
  reply: string;
  intent: 'action' | 'conversational';
  action?: string;
}
