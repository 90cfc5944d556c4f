export const COLLECTIONS = {
  conversations: 'conversations',
  messages: 'messages',
  reports: 'reports',
  users: 'users',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];
